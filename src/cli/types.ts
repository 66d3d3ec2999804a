/**
 * A `quarry` subcommand.
 */
export interface Command {
  readonly name: string;
  /** One line, shown in the command list. */
  readonly description: string;
  readonly usage: string;
  /** Invocations shown under `quarry <command> --help`. */
  readonly examples?: readonly string[];
  /**
   * Receives the arguments after the command name, with global flags removed.
   * Reports usage errors itself and exits with the matching code.
   */
  handler: (args: string[]) => Promise<void>;
}
