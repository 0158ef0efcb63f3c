import { ConfigOverrides } from './config.js';

/**
 * Parsed command line
 */
export interface CliArgs {
  overrides: ConfigOverrides;
  element?: string;
  check: boolean;
  help: boolean;
  /** Arguments that were not understood */
  unknown: string[];
}

export const USAGE = `Usage: policy-docgen [--stack-dir=DIR] [--output-dir=DIR] [--element=NAME] [--check] [--html] [--help]

Generate reference documentation from the @description comments in each
element's values.yaml.

Options:
  --stack-dir=DIR    Directory containing stack elements (default: stack)
  --output-dir=DIR   Output directory for documentation (default: docs)
  --element=NAME     Generate documentation for one element only
  --check            Compare with the existing files instead of writing; exit 1 if outdated
  --html             Also write an HTML preview of each report
  --help             Show this message

Environment:
  DOCGEN_STACK_DIR, DOCGEN_OUTPUT_DIR, DOCGEN_CONFIG (default: docgen.config.json)`;

const VALUE_FLAGS = {
  '--stack-dir': 'stackDir',
  '--output-dir': 'outputDir',
  '--element': 'element'
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

function isValueFlag(flag: string): flag is ValueFlag {
  return flag in VALUE_FLAGS;
}

/**
 * Parse `--name=value` and bare boolean flags. A value flag may also take its
 * value from the next argument.
 */
export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = { overrides: {}, check: false, help: false, unknown: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);

    if (isValueFlag(flag)) {
      const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
      if (value === undefined || value === '') {
        result.unknown.push(arg);
        continue;
      }
      const target = VALUE_FLAGS[flag];
      if (target === 'element') {
        result.element = value;
      } else {
        result.overrides[target] = value;
      }
      continue;
    }

    switch (arg) {
      case '--check':
        result.check = true;
        break;
      case '--html':
        result.overrides.html = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        result.unknown.push(arg);
    }
  }

  return result;
}
