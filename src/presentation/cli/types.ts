// ============================================================================
// RUTA: src/presentation/cli/types.ts
// ============================================================================

export interface CliOutput {
  readonly print: (line: string) => void;
  readonly error: (line: string) => void;
}

export interface CliCommand {
  readonly name: string;
  readonly description: string;
  readonly usage: string;
  readonly aliases?: ReadonlyArray<string>;
  /** Devuelve el código de salida del proceso. */
  readonly execute: (args: ReadonlyArray<string>, output: CliOutput) => Promise<number>;
}
