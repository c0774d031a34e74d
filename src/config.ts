import { ConfigurationError } from "./errors";
import { KeyProcessor } from "./processor";

export interface Config {
  scriptPath?: string;
  displayDigits: number;
  verbose: boolean;
}

export const USAGE = "Usage: desk-calc [SCRIPT_PATH] [--digits N] [--verbose]";

export function parseArgs(args: string[]): Config {
  const config: Config = { displayDigits: 0, verbose: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--digits":
      case "-d": {
        const value = args[++i];
        if (value === undefined || !/^\d+$/.test(value)) {
          throw new ConfigurationError(`${arg} expects a non-negative integer`, {
            value,
          });
        }
        const digits = Number(value);
        if (digits > KeyProcessor.MAX_DISPLAY_DIGITS) {
          throw new ConfigurationError(
            `${arg} must not exceed ${KeyProcessor.MAX_DISPLAY_DIGITS}`,
            { value }
          );
        }
        config.displayDigits = digits;
        break;
      }
      case "--verbose":
      case "-v":
        config.verbose = true;
        break;
      default: {
        if (arg.startsWith("-")) {
          throw new ConfigurationError(`Unknown option ${arg}`);
        }
        if (config.scriptPath !== undefined) {
          throw new ConfigurationError("Only one script path may be given", {
            scriptPath: config.scriptPath,
            extra: arg,
          });
        }
        config.scriptPath = arg;
      }
    }
  }

  return config;
}
