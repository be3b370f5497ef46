#!/usr/bin/env node

// CLI entry point
// - Command name: `idlgen` with subcommands `generate`, `targets`, `print` and `sample`.
// - Every command reads a JSON schema document (--schema) and builds a FileGroup from it.
// - `generate` writes the main stream under --out and the test-data stream under
//   --test-data-out; `targets` and `print` show what it would write.
// - `sample` draws instances of one entity with the in-process interpreter and prints JSON.

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  ConfigurationError,
  ErrorPresenter,
  InternalError,
  createTestDataRegistry,
  generateFileGroup,
  isIdlGenError,
  listTargets,
  renderFileGroup,
  resolveOptions,
  type IdlGenError,
} from '@idlgen/core';
import { createContext } from '@idlgen/runtime';
import { renderCLIView } from './render.js';
import {
  parseCodegenOptions,
  parseContextOptions,
  resolveOutputFormat,
  resolveSampleCount,
  type CliOptions,
} from './flags.js';
import { printDiagnostics, printEffectiveConfig } from './debug.js';
import { readFileGroup } from './input.js';
import { sampleInstances, toJsonValue } from './sample.js';
import { writeModules } from './writer.js';

function withLayoutOptions(command: Command): Command {
  return command
    .option('-s, --schema <file>', 'Schema document (JSON) path')
    .option('-o, --out <dir>', 'Root directory of main modules (default: gen)')
    .option('--test-data-out <dir>', 'Root directory of test-data modules (default: gen-test)')
    .option('--no-test-data', 'Do not generate test-data modules')
    .option('--suffix <name>', 'Name segment of test-data modules (default: TestData)')
    .option('--runtime-module <specifier>', 'Module test-data code imports helpers from')
    .option('--verbose', 'Print generation diagnostics to stderr', false)
    .option('--debug-config', 'Print effective configuration to stderr', false);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('idlgen')
    .description('Generate TypeScript modules and fast-check test data from IDL schema documents')
    .version('0.1.0');

  withLayoutOptions(
    program.command('generate').description('Write main and test-data modules')
  ).action(async (options: CliOptions) => {
    try {
      const fileGroup = await readFileGroup(options.schema);
      const resolved = resolveOptions(parseCodegenOptions(options));
      if (options.debugConfig) {
        printEffectiveConfig(resolved);
      }

      const generated = generateFileGroup(fileGroup, resolved);
      if (generated.isErr()) {
        throw generated.error;
      }
      const { modules, testDataModules, diagnostics } = generated.value;
      if (options.verbose) {
        printDiagnostics(diagnostics);
      }

      const written = [
        ...(await writeModules(resolved.layout.main, modules)),
        ...(await writeModules(resolved.layout.testData, testDataModules)),
      ];
      if (written.length > 0) {
        process.stdout.write(written.join('\n') + '\n');
      }
      if (options.verbose) {
        process.stderr.write(
          `[idlgen] wrote ${modules.length} main and ${testDataModules.length} test-data modules\n`
        );
      }
    } catch (err: unknown) {
      await handleCliError(err);
    }
  });

  withLayoutOptions(
    program.command('targets').description('List the files generate would write')
  ).action(async (options: CliOptions) => {
    try {
      const fileGroup = await readFileGroup(options.schema);
      const targets = listTargets(fileGroup, parseCodegenOptions(options));
      if (targets.isErr()) {
        throw targets.error;
      }
      if (targets.value.length > 0) {
        process.stdout.write(targets.value.join('\n') + '\n');
      }
    } catch (err: unknown) {
      await handleCliError(err);
    }
  });

  withLayoutOptions(
    program.command('print').description('Print every main module to stdout')
  ).action(async (options: CliOptions) => {
    try {
      const fileGroup = await readFileGroup(options.schema);
      const rendered = renderFileGroup(fileGroup, parseCodegenOptions(options));
      if (rendered.isErr()) {
        throw rendered.error;
      }
      process.stdout.write(rendered.value);
    } catch (err: unknown) {
      await handleCliError(err);
    }
  });

  program
    .command('sample')
    .description('Draw test-data instances of one entity and print them as JSON')
    .option('-s, --schema <file>', 'Schema document (JSON) path')
    .option('-e, --entity <name>', 'Output name of the entity, e.g. Acme.Point')
    .option('-c, --count <number>', 'Number of instances to draw')
    .option('-n, --n <number>', 'Alias for --count')
    .option('--seed <number>', 'Deterministic seed', '424242')
    .option('--max-depth <number>', 'Depth from which optional fields stay absent')
    .option('--max-collection-size <number>', 'Upper bound for container sizes')
    .option('--strings <style>', 'String style: arbitrary|lorem')
    .option('--defaults', 'Apply declared defaults to every instance', false)
    .option('--suffix <name>', 'Name segment of test-data modules (default: TestData)')
    .option('--format <format>', 'Output format: json|ndjson', 'json')
    .option('--debug-config', 'Print effective configuration to stderr', false)
    .action(async (options: CliOptions) => {
      try {
        const fileGroup = await readFileGroup(options.schema);
        if (!options.entity) {
          throw new ConfigurationError('Missing --entity <name>', { option: 'entity' });
        }
        const codegen = parseCodegenOptions(options);
        const contextOptions = parseContextOptions(options);
        const context = createContext(contextOptions);
        const count = resolveSampleCount(options);
        const format = resolveOutputFormat(options.format);
        if (options.debugConfig) {
          printEffectiveConfig(resolveOptions(codegen), context);
        }

        const registry = createTestDataRegistry(fileGroup, codegen);
        const items = sampleInstances(registry, {
          entity: options.entity,
          count,
          seed: contextOptions.seed ?? 424242,
          context,
          defaults: options.defaults === true,
        }).map(toJsonValue);

        if (format === 'ndjson') {
          const lines = items.map((item) => JSON.stringify(item ?? null));
          if (lines.length > 0) {
            process.stdout.write(lines.join('\n') + '\n');
          }
        } else {
          process.stdout.write(JSON.stringify(items, null, 2) + '\n');
        }
      } catch (err: unknown) {
        await handleCliError(err);
      }
    });

  return program;
}

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: IdlGenError;
  if (isIdlGenError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError(message || 'Unexpected error', err instanceof Error ? err : undefined);
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

const program = createProgram();

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(path.resolve(process.argv[1])) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
