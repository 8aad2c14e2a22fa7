import type { TerminalInput } from '../client/prompt';
import type { ProgramSummary } from '../shared/api';
import type { AppConfig } from '../shared/config';

export interface Program {
  run(): Promise<void>;
}

export type ProgramContext = {
  config: AppConfig;
  input: TerminalInput;
  output: NodeJS.WritableStream;
  catalog: ProgramSummary[];
};

export type ProgramDefinition = ProgramSummary & {
  create: (context: ProgramContext) => Program;
};
