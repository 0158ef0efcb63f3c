#!/usr/bin/env node
import { parseArgs, USAGE } from './cli-args.js';
import { DocgenConfig, resolveConfig } from './config.js';
import { ConfigError } from './errors.js';
import { runGeneration } from './generator.js';

async function bootstrap(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (args.unknown.length > 0) {
    console.error(`Unknown or incomplete arguments: ${args.unknown.join(' ')}\n`);
    console.error(USAGE);
    return 1;
  }

  let config: DocgenConfig;
  try {
    config = await resolveConfig({ overrides: args.overrides });
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(`Invalid configuration: ${err.message}`);
    return 1;
  }

  console.log(`Stack directory: ${config.stackDir}`);
  console.log(`Output directory: ${config.outputDir}`);

  const result = await runGeneration({
    stackDir: config.stackDir,
    outputDir: config.outputDir,
    element: args.element,
    check: args.check,
    html: config.html
  });
  return result.exitCode;
}

bootstrap().then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('Documentation generation failed:', err);
    process.exitCode = 1;
  }
);
