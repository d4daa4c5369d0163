/**
 * Argument parser for service commands.
 * Parses raw argument strings based on command parameter definitions.
 * @module
 */

import type { ParameterDefinition } from './types.ts';

/**
 * Structure holding the results of argument parsing.
 */
export interface ParsedArguments {
  /** Parsed options/flags: { name: value } */
  options: Record<string, string | boolean | number>;
  /** Arguments not matching defined options/flags */
  positional: string[];
  /** List of parsing errors encountered */
  errors: string[];
  /** Flag indicating if a help option (e.g., --?, --help) was detected */
  helpRequested?: boolean;
}

/**
 * Parses raw argument strings into structured options and positional arguments
 * based on the provided parameter definitions.
 *
 * Supports:
 *   --name=value
 *   --name value
 *   --flag (boolean true)
 *   -a value (if alias 'a' is defined)
 *   -f (boolean true if alias 'f' is defined as a flag)
 *   --? or --help triggers helpRequested flag
 *
 * Values of `number` parameters are converted; a non-numeric value is reported
 * as an error. A lone `-` followed by digits counts as a value, not an alias.
 *
 * @param rawArgs - Array of raw string arguments (excluding service/command names).
 * @param paramDefs - Array of ParameterDefinition objects for the specific command.
 */
export function parseArguments(rawArgs: string[], paramDefs: ParameterDefinition[] = []): ParsedArguments {
  const result: ParsedArguments = {
    options: {},
    positional: [],
    errors: [],
    helpRequested: false,
  };

  const defsByName = new Map<string, ParameterDefinition>();
  const defsByAlias = new Map<string, ParameterDefinition>();
  const requiredParams = new Set<string>();

  for (const def of paramDefs) {
    defsByName.set(def.name, def);
    if (def.alias) {
      defsByAlias.set(def.alias, def);
    }
    if (def.required && !def.isFlag) { // Flags cannot be logically 'required' in the same way as value options
      requiredParams.add(def.name);
    }
  }

  const isValue = (arg: string | undefined): boolean =>
    arg !== undefined && (!arg.startsWith('-') || /^-\d/.test(arg));

  const store = (def: ParameterDefinition, raw: string, label: string): void => {
    if (def.type === 'number') {
      const value = Number(raw);
      if (raw.trim() === '' || !Number.isFinite(value)) {
        result.errors.push(`Option ${label} expects a number, got "${raw}".`);
        return;
      }
      result.options[def.name] = value;
    } else if (def.type === 'boolean') {
      if (raw !== 'true' && raw !== 'false') {
        result.errors.push(`Option ${label} expects true or false, got "${raw}".`);
        return;
      }
      result.options[def.name] = raw === 'true';
    } else {
      result.options[def.name] = raw;
    }
  };

  let i = 0;
  while (i < rawArgs.length) {
    const arg = rawArgs[i];

    if (arg === '--?' || arg === '--help') {
      result.helpRequested = true;
      break;
    }

    // --- Long options (`--name=value` or `--name`) ---
    if (arg.startsWith('--')) {
      let optionName = arg.substring(2);
      let value: string | undefined = undefined;
      const equalsIndex = optionName.indexOf('=');

      if (equalsIndex !== -1) {
        value = optionName.substring(equalsIndex + 1);
        optionName = optionName.substring(0, equalsIndex);
      }

      const def = defsByName.get(optionName);

      if (!def) {
        result.errors.push(`Unknown option: --${optionName}`);
      } else if (def.isFlag) {
        if (value !== undefined) {
          result.errors.push(`Option --${optionName} is a flag and does not accept a value.`);
        } else {
          result.options[def.name] = true;
        }
      } else {
        if (value === undefined) {
          const next = rawArgs[i + 1];
          if (isValue(next)) {
            value = next;
            i++;
          }
        }
        if (value === undefined) {
          result.errors.push(`Option --${optionName} requires a value.`);
        } else {
          store(def, value, `--${optionName}`);
        }
      }
      i++;
      continue;
    }

    // --- Short options (`-a value` or `-f`) ---
    if (arg.startsWith('-') && !isValue(arg)) {
      const alias = arg.substring(1);
      const def = alias.length === 1 ? defsByAlias.get(alias) : undefined;

      if (alias.length !== 1) {
        result.errors.push(`Invalid short option format: ${arg}. Use single character aliases.`);
      } else if (!def) {
        result.errors.push(`Unknown option alias: -${alias}`);
      } else if (def.isFlag) {
        result.options[def.name] = true;
      } else {
        const next = rawArgs[i + 1];
        if (isValue(next)) {
          store(def, next, `-${alias}`);
          i++;
        } else {
          result.errors.push(`Option -${alias} (--${def.name}) requires a value.`);
        }
      }
      i++;
      continue;
    }

    result.positional.push(arg);
    i++;
  }

  if (!result.helpRequested) {
    for (const required of requiredParams) {
      if (!(required in result.options)) {
        result.errors.push(`Missing required option: --${required}`);
      }
    }
  }

  return result;
}
