/**
 * CLI Types - Shared type definitions for the kiln CLI
 */

export type Command =
  | 'validate'
  | 'show'
  | 'schema-hash'
  | 'convert'
  | 'pack'
  | 'chunk'
  | 'input'
  | 'output'
  | 'guest-config'
  | 'upload'
  | 'invoke'
  | 'accounts'
  | 'registry'
  | 'help';

export interface CLIOptions {
  command: Command;
  /** Second word for `accounts` and `registry` */
  subcommand: string | null;
  positionals: string[];
  /** `--name value` and `--name=value` flags; bare switches map to true */
  flags: Map<string, string | true>;
  help: boolean;
  verbose: boolean;
  debug: boolean;
  quiet: boolean;
}

/** Exit status of a command */
export type CommandResult = number;

export type CommandHandler = (opts: CLIOptions) => Promise<CommandResult>;
