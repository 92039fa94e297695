/**
 * CLI Argument Parser
 *
 * Parses command-line arguments into a structured format for command routing.
 */

export interface ParsedArgs {
  command: string | null;
  flags: Record<string, string | boolean>;
  positional: string[];
}

// Short flags that take a value
const SHORT_VALUE_FLAGS = new Set(["n", "t", "o", "f", "c"]);

// Long flags that never consume the next argument
const BOOLEAN_FLAGS = new Set(["json", "yes", "help", "version", "toggle", "clear", "path", "raw", "copy"]);

const SHORT_ALIASES: Record<string, string> = {
  h: "help",
  v: "version",
  y: "yes",
};

/**
 * Parse command-line arguments
 *
 * Supports:
 * - Commands: First non-flag argument (e.g., "history", "pin", "export")
 * - Flags: Arguments starting with - or -- (e.g., --json, -n 20, --format=yaml)
 * - Positional: Remaining non-flag arguments
 * - "--" ends flag parsing; everything after it is positional
 *
 * Examples:
 *   parseArgs([]) => { command: null, flags: {}, positional: [] }
 *   parseArgs(['history']) => { command: 'history', flags: {}, positional: [] }
 *   parseArgs(['-y']) => { command: null, flags: { y: true, yes: true }, positional: [] }
 *   parseArgs(['pin', 'a1b2', '--title=Address']) => { command: 'pin', flags: { title: 'Address' }, positional: ['a1b2'] }
 */
export function parseArgs(args: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];
  let command: string | null = null;
  let flagsEnded = false;

  // A lone "-" (stdout) counts as a value
  const takesNext = (i: number) =>
    i + 1 < args.length && (args[i + 1] === "-" || !args[i + 1].startsWith("-"));

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (!flagsEnded && arg === "--") {
      flagsEnded = true;
    }
    // Handle flags (a lone "-" is a value)
    else if (!flagsEnded && arg.startsWith("-") && arg.length > 1) {
      // Long flag with value: --name=value
      if (arg.startsWith("--") && arg.includes("=")) {
        const separator = arg.indexOf("=");
        flags[arg.slice(2, separator)] = arg.slice(separator + 1);
      }
      // Long flag: --flag [value]
      else if (arg.startsWith("--")) {
        const key = arg.slice(2);
        if (!BOOLEAN_FLAGS.has(key) && takesNext(i)) {
          flags[key] = args[i + 1];
          i++;
        } else {
          flags[key] = true;
        }
      }
      // Short flag(s): -y or -yn 5
      else {
        const shortFlags = arg.slice(1).split("");
        for (let j = 0; j < shortFlags.length; j++) {
          const flag = shortFlags[j];
          // A value flag takes the next argument only when last in its group
          if (SHORT_VALUE_FLAGS.has(flag) && j === shortFlags.length - 1 && takesNext(i)) {
            flags[flag] = args[i + 1];
            i++;
          } else {
            flags[flag] = true;
          }
          const alias = SHORT_ALIASES[flag];
          if (alias !== undefined) {
            flags[alias] = true;
          }
        }
      }
    }
    // First non-flag is the command
    else if (command === null) {
      command = arg;
    }
    // Rest are positional arguments
    else {
      positional.push(arg);
    }
  }

  return { command, flags, positional };
}

/**
 * First string value among the given flag names
 */
export const stringFlag = (args: ParsedArgs, ...names: string[]): string | undefined => {
  for (const name of names) {
    const value = args.flags[name];
    if (typeof value === "string") {
      return value;
    }
  }
  return undefined;
};

/**
 * True when any of the given flags was passed
 */
export const booleanFlag = (args: ParsedArgs, ...names: string[]): boolean =>
  names.some((name) => args.flags[name] !== undefined && args.flags[name] !== false);
