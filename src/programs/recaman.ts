import fs from 'node:fs';
import path from 'node:path';
import { recamanSequence } from '../shared/recaman';
import type { Program, ProgramContext } from './types';

export function formatLogLine(terms: number[], timestamp: Date): string {
  return `${timestamp.toISOString()} terms=${terms.length} ${terms.join(',')}\n`;
}

export class RecamanProgram implements Program {
  constructor(
    private readonly context: ProgramContext,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async run(): Promise<void> {
    const { config, output } = this.context;
    const terms = recamanSequence(config.recamanTerms);

    output.write(`Recaman's Sequence (first ${terms.length} terms)\n\n`);
    output.write('a(n) = a(n-1) - n if that is positive and not already in the sequence,\n');
    output.write('otherwise a(n) = a(n-1) + n\n\n');
    terms.forEach((value, n) => output.write(`a(${n}) = ${value}\n`));

    this.appendLog(terms);
  }

  private appendLog(terms: number[]): void {
    const logFile = this.context.config.recamanLogFile;
    try {
      fs.mkdirSync(path.dirname(logFile), { recursive: true });
      fs.appendFileSync(logFile, formatLogLine(terms, this.clock()));
    } catch (error) {
      console.warn(`[RECAMAN] Failed to append to ${logFile}:`, error);
    }
  }
}
