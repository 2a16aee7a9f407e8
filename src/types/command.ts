/**
 * A structured command ready for execution.
 * Host adapters never build raw shell strings; they produce Command objects.
 */
export interface Command {
  readonly argv: string[];
  readonly env?: Record<string, string>;
}

/** What a single external command reported back. */
export interface CommandOutcome {
  readonly ok: boolean;
  readonly exitCode: number;
  readonly stderr: string;
}
