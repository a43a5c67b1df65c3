import { PROVIDER_TYPES } from "../providers/types";
import type { ProviderType } from "../providers/types";
import { ConfigError } from "../runtime/config";
import type { ConfigOverrides } from "../runtime/config";

export interface CliArgs {
  overrides: ConfigOverrides;
  help: boolean;
}

export const USAGE = `Usage: stepwise-agent [options]

Options:
  --provider <openai|anthropic|gemini>  LLM provider (default: openai)
  --model <id>                          Model id (default depends on provider)
  --max-steps <n>                       Stop a query after n model replies
  --event-log <path>                    Append run events to a JSONL file
  --help                                Show this help`;

function isProviderType(value: string): value is ProviderType {
  return (PROVIDER_TYPES as readonly string[]).includes(value);
}

export function parseArgs(args: string[]): CliArgs {
  const overrides: ConfigOverrides = {};
  let help = false;

  const valueAfter = (flag: string, index: number): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new ConfigError(`Missing value for ${flag}`, flag);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--provider") {
      const p = valueAfter(arg, i);
      if (!isProviderType(p)) {
        throw new ConfigError(
          `Unknown provider: ${p}. Use ${PROVIDER_TYPES.join(", ")}.`,
          arg
        );
      }
      overrides.provider = p;
      i++;
    } else if (arg === "--model") {
      overrides.model = valueAfter(arg, i);
      i++;
    } else if (arg === "--max-steps") {
      const raw = valueAfter(arg, i);
      const n = Number(raw);
      if (!Number.isInteger(n) || n < 1) {
        throw new ConfigError(
          `--max-steps must be a positive integer, got "${raw}"`,
          arg
        );
      }
      overrides.maxSteps = n;
      i++;
    } else if (arg === "--event-log") {
      overrides.eventLogPath = valueAfter(arg, i);
      i++;
    } else if (arg === "--help" || arg === "-h") {
      help = true;
    } else {
      throw new ConfigError(`Unknown option: ${arg}`, arg);
    }
  }

  return { overrides, help };
}
