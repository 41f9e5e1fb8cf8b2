/**
 * OpenCLI document model types.
 *
 * These types mirror the OpenCLI description format. Sequence fields are always
 * present (empty when the serialized document omits them); optional scalar and
 * object fields are represented by the property being absent.
 *
 * @packageDocumentation
 */

/**
 * Arbitrary structured value carried by a metadata entry.
 */
export type MetadataValue =
  | null
  | boolean
  | number
  | string
  | MetadataValue[]
  | { [key: string]: MetadataValue };

/**
 * Root object of an OpenCLI description.
 */
export interface OpenCliDocument {
  /** The OpenCLI version number. */
  opencli: string;
  /** Information about the CLI. */
  info: OpenCliInfo;
  /** The conventions used by the CLI. */
  conventions?: OpenCliConventions;
  /** Root command arguments. */
  arguments: OpenCliArgument[];
  /** Root command options. */
  options: OpenCliOption[];
  /** Root command sub commands. */
  commands: OpenCliCommand[];
  /** Root command exit codes. */
  exitCodes: OpenCliExitCode[];
  /** Examples of how to use the CLI. */
  examples: string[];
  /** Whether the CLI requires interactive input. */
  interactive?: boolean;
  /** Custom metadata. */
  metadata: OpenCliMetadata[];
}

/**
 * Identity, version, contact and license of the CLI.
 */
export interface OpenCliInfo {
  /** The application title. */
  title: string;
  /** A short summary of the application. */
  summary?: string;
  /** A description of the application. */
  description?: string;
  /** The contact information. */
  contact?: OpenCliContact;
  /** The application license. */
  license?: OpenCliLicense;
  /** The application version. */
  version: string;
}

/**
 * Global parsing conventions. An absent field means the format default applies.
 */
export interface OpenCliConventions {
  /** Whether grouping of short options is allowed. */
  groupOptions?: boolean;
  /** The option argument separator. */
  optionArgumentSeparator?: string;
}

export interface OpenCliContact {
  /** The identifying name of the contact person/organization. */
  name?: string;
  /** The URI for the contact information. */
  url?: string;
  /** The email address of the contact person/organization. */
  email?: string;
}

export interface OpenCliLicense {
  /** The license name. */
  name?: string;
  /** The SPDX license identifier. */
  identifier?: string;
}

/**
 * A command or sub command. Commands nest without a depth limit.
 */
export interface OpenCliCommand {
  /** The command name. */
  name: string;
  /** The command aliases. Uniqueness is not enforced. */
  aliases: string[];
  options: OpenCliOption[];
  arguments: OpenCliArgument[];
  /** The command's sub commands. */
  commands: OpenCliCommand[];
  exitCodes: OpenCliExitCode[];
  description?: string;
  /** Whether the command is hidden. */
  hidden?: boolean;
  /** Examples of how to use the command. */
  examples: string[];
  /** Whether the command requires interactive input. */
  interactive?: boolean;
  metadata: OpenCliMetadata[];
}

/**
 * A positional value accepted by a command or an option.
 */
export interface OpenCliArgument {
  /** The argument name. */
  name: string;
  /** Whether the argument is required. */
  required?: boolean;
  /** Minimum and maximum number of argument values. */
  arity?: OpenCliArity;
  /** A list of accepted values. */
  acceptedValues: string[];
  /** The argument group. */
  group?: string;
  description?: string;
  hidden?: boolean;
  metadata: OpenCliMetadata[];
}

/**
 * A named option of a command.
 */
export interface OpenCliOption {
  /** The option name. */
  name: string;
  /** Whether the option is required. */
  required?: boolean;
  aliases: string[];
  /** Values the option itself accepts. */
  arguments: OpenCliArgument[];
  /** The option group. */
  group?: string;
  description?: string;
  /**
   * Whether the option is accessible from the immediate parent command and,
   * recursively, from its sub commands.
   */
  recursive?: boolean;
  hidden?: boolean;
  metadata: OpenCliMetadata[];
}

/**
 * Declared value count of an argument. Minimum may exceed maximum.
 */
export interface OpenCliArity {
  /** The minimum number of values allowed. */
  minimum?: number;
  /** The maximum number of values allowed. */
  maximum?: number;
}

export interface OpenCliExitCode {
  /** The exit code. */
  code: number;
  /** The exit code description. */
  description?: string;
}

/**
 * A custom extension entry.
 */
export interface OpenCliMetadata {
  /** The metadata name. */
  name: string;
  /** The metadata value. A serialized `null` is read as absent. */
  value?: MetadataValue;
}
