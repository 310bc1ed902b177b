import readline from 'node:readline';
import type { PairPrompt, TournamentIO } from '../preferences/tournament';

/** Terminal prompts for an interactive tournament. End of input counts as Quit. */
export function createReadlineIO(): TournamentIO & { close(): void } {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  let pending: ((answer: string) => void) | null = null;
  rl.on('close', () => {
    closed = true;
    pending?.('Q');
    pending = null;
  });

  const question = (text: string) =>
    new Promise<string>(resolve => {
      if (closed) return resolve('Q');
      pending = resolve;
      rl.question(text, answer => {
        pending = null;
        resolve(answer);
      });
    });

  return {
    async ask(prompt: PairPrompt) {
      const counter = prompt.limit === null ? `${prompt.number}` : `${prompt.number}/${prompt.limit}`;
      const header = `--- Comparison ${counter} ---`;
      console.log(`\n${header}\n`);
      console.log(`[A] ${prompt.a.title} (score: ${prompt.a.overallScore.toFixed(2)}, Elo: ${prompt.a.elo.toFixed(0)})\n`);
      console.log(`[B] ${prompt.b.title} (score: ${prompt.b.overallScore.toFixed(2)}, Elo: ${prompt.b.elo.toFixed(0)})\n`);
      return question('Which is better? [A/B/S/Q]: ');
    },
    say(line: string) {
      console.log(line);
    },
    close() {
      rl.close();
    }
  };
}
