import type { z } from 'zod';
import type {
  CriterionSchema,
  FacetsSchema,
  IdeaSchema,
  IdeaStatusSchema,
  OriginSchema,
  PopulationStateSchema,
  ScoresSchema
} from './schemas/idea';
import type {
  EventTypeSchema,
  FinalResultSchema,
  LlmModeSchema,
  RunConfigSchema,
  RunEventSchema,
  RunnerUpSchema,
  ScoringWeightsSchema
} from './schemas/run';
import type {
  ComparisonSchema,
  DerivedProfileSchema,
  PortableProfileSchema,
  PreferencesSchema
} from './schemas/preferences';

export type Criterion = z.infer<typeof CriterionSchema>;
export type Scores = z.infer<typeof ScoresSchema>;
export type Facets = z.infer<typeof FacetsSchema>;
export type Origin = z.infer<typeof OriginSchema>;
export type IdeaStatus = z.infer<typeof IdeaStatusSchema>;
export type Idea = z.infer<typeof IdeaSchema>;
export type PopulationState = z.infer<typeof PopulationStateSchema>;

export type ScoringWeights = z.infer<typeof ScoringWeightsSchema>;
export type LlmMode = z.infer<typeof LlmModeSchema>;
export type RunConfig = z.infer<typeof RunConfigSchema>;
export type EventType = z.infer<typeof EventTypeSchema>;
export type RunEvent = z.infer<typeof RunEventSchema>;
export type RunnerUp = z.infer<typeof RunnerUpSchema>;
export type FinalResult = z.infer<typeof FinalResultSchema>;

export type Comparison = z.infer<typeof ComparisonSchema>;
export type Preferences = z.infer<typeof PreferencesSchema>;
export type DerivedProfile = z.infer<typeof DerivedProfileSchema>;
export type PortableProfile = z.infer<typeof PortableProfileSchema>;

/** Idea fields an LLM task sees. */
export interface IdeaBrief {
  id: string;
  title: string;
  summary: string;
}

export type MutationType = 'audience' | 'monetization' | 'distribution' | 'differentiator' | 'jtbd';

// One call shape, several payloads. merge/mutate are not wired into the pipeline yet.
export type LlmTask =
  | { kind: 'generate'; prompt: string; count: number }
  | { kind: 'critic'; ideas: IdeaBrief[] }
  | { kind: 'refine'; id: string; title: string; summary: string; facets: Facets; judgeNotes: string }
  | {
      kind: 'merge';
      ideaA: { title: string; summary: string; facets: Facets };
      ideaB: { title: string; summary: string; facets: Facets };
    }
  | { kind: 'mutate'; idea: { title: string; summary: string; facets: Facets }; mutationType: MutationType };

export type LlmTaskKind = LlmTask['kind'];

export type StopReason = 'threshold' | 'stagnation' | 'max_rounds';

export type RunStatus =
  | 'running'
  | 'stopped_by_threshold'
  | 'stopped_by_stagnation'
  | 'stopped_by_max_rounds'
  | 'finalized';

export type RiskMode = 'as_benefit' | 'invert';

export type TournamentMode = 'auto' | 'exhaustive' | 'pairwise';

export type TournamentChoice = 'A' | 'B' | 'S' | 'Q';
