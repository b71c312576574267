#!/usr/bin/env node

// CLI entry point
// - Command name: `reflect-schema` with subcommands `generate`, `type`,
//   `validate` and `instantiate`.
// - Every command loads a JSON class manifest into a ManifestHost and drives
//   a SchemaLibrary from @reflect-schema/core over it.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorCode,
  ErrorPresenter,
  InternalError,
  ManifestHost,
  ResolutionError,
  SchemaLibrary,
  isErr,
  formatJson,
  isReflectSchemaError,
  parseJsonExact,
  toPlain,
  type CompiledSchema,
  type ReflectSchemaError,
  type Result,
} from '@reflect-schema/core';
import { renderCLIView } from './render.js';
import { loadConfigFile, readCliFile } from './config/schema-options.js';
import {
  parseTypeDescriptor,
  resolveClassTarget,
  type ClassTargetFlags,
  type CommonFlags,
  type GenerateFlags,
  type InputFlags,
  type TypeFlags,
} from './flags.js';

interface Session {
  host: ManifestHost;
  library: SchemaLibrary;
}

function unwrap<T>(result: Result<T, ReflectSchemaError>): T {
  if (isErr(result)) {
    throw result.error;
  }
  return result.value;
}

function openSession(flags: CommonFlags): Session {
  const options = unwrap(loadConfigFile(flags.config));
  const host = unwrap(
    ManifestHost.fromJson(readCliFile(flags.manifest, '--manifest'), flags.manifest)
  );
  const library = new SchemaLibrary(host, options);

  if (flags.debug) {
    process.stderr.write(
      `[reflect-schema] effective config: ${JSON.stringify(library.options, null, 2)}\n`
    );
  }
  return { host, library };
}

function classSchema(session: Session, flags: ClassTargetFlags): CompiledSchema {
  const target = resolveClassTarget(flags);
  if (target.kind === 'named') {
    return unwrap(session.library.generateNamedClassSchema(target.name));
  }
  if (!session.host.findScript(target.location)) {
    throw new ResolutionError({
      message: `No class is declared at "${target.location}"`,
      errorCode: ErrorCode.CLASS_NOT_FOUND,
      context: { definition: target.location },
    });
  }
  return unwrap(session.library.generateUnnamedClassSchema(target.location));
}

function finish(session: Session, flags: CommonFlags): void {
  if (flags.printMetrics) {
    process.stderr.write(
      `[reflect-schema] metrics: ${JSON.stringify(session.library.metrics())}\n`
    );
  }
}

function printSchema(
  schema: CompiledSchema,
  flags: { compact?: boolean; responseFormat?: string }
): void {
  if (flags.responseFormat !== undefined) {
    const text = unwrap(schema.responseFormatJson(flags.responseFormat, !flags.compact));
    process.stdout.write(text + '\n');
    return;
  }
  process.stdout.write((flags.compact ? schema.toJsonCompact() : schema.json) + '\n');
}

function withCommonOptions(command: Command): Command {
  return command
    .requiredOption('-m, --manifest <file>', 'Class manifest (JSON) file path')
    .option('--config <file>', 'Options file (JSON)')
    .option('--debug', 'Print effective configuration to stderr', false)
    .option('--print-metrics', 'Print metrics as JSON to stderr', false);
}

function withClassTarget(command: Command): Command {
  return command
    .option('-c, --class <name>', 'Globally named class')
    .option('-l, --location <location>', 'Script location of an unnamed class');
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('reflect-schema')
    .description('JSON Schema generation and instantiation for reflective classes')
    .version('0.1.0');

  withClassTarget(withCommonOptions(program.command('generate')))
    .description('Print the JSON Schema of a class')
    .option('--compact', 'Print without indentation', false)
    .option(
      '--response-format <name>',
      'Wrap the schema into a structured-output response format'
    )
    .action(async (flags: GenerateFlags) => {
      try {
        const session = openSession(flags);
        printSchema(classSchema(session, flags), flags);
        finish(session, flags);
      } catch (err: unknown) {
        await handleCliError(err);
      }
    });

  withCommonOptions(program.command('type'))
    .description('Print the JSON Schema of a single property type')
    .option('-k, --kind <kind>', 'Value kind (e.g. int, vector2, object, array)')
    .option('--class-name <name>', 'Class name, or Class.Enum path with --enum')
    .option('--hint <hint>', 'Property hint (e.g. array_type)')
    .option('--hint-string <text>', 'Hint payload')
    .option('--enum', 'Integer typed by the enum named in --class-name', false)
    .option('--array-of <type>', 'Typed array of the given element type')
    .option('--compact', 'Print without indentation', false)
    .action(async (flags: TypeFlags) => {
      try {
        const descriptor = parseTypeDescriptor(flags);
        const session = openSession(flags);
        printSchema(unwrap(session.library.generateTypeInfoSchema(descriptor)), flags);
        finish(session, flags);
      } catch (err: unknown) {
        await handleCliError(err);
      }
    });

  withClassTarget(withCommonOptions(program.command('validate')))
    .description('Validate a JSON document against the schema of a class')
    .requiredOption('-i, --input <file>', 'JSON document file path')
    .action(async (flags: InputFlags) => {
      try {
        const session = openSession(flags);
        const schema = classSchema(session, flags);
        const value = unwrap(parseJsonExact(readCliFile(flags.input, '--input'), flags.input));
        unwrap(schema.validate(value));
        process.stdout.write(JSON.stringify({ valid: true }) + '\n');
        finish(session, flags);
      } catch (err: unknown) {
        await handleCliError(err);
      }
    });

  withClassTarget(withCommonOptions(program.command('instantiate')))
    .description('Validate a JSON document and build an instance of the class')
    .requiredOption('-i, --input <file>', 'JSON document file path')
    .action(async (flags: InputFlags) => {
      try {
        const session = openSession(flags);
        const schema = classSchema(session, flags);
        const instance = unwrap(schema.instantiate(readCliFile(flags.input, '--input')));
        process.stdout.write(
          formatJson(
            toPlain(instance, session.host.describeObject),
            session.library.options.output.indent
          ) + '\n'
        );
        finish(session, flags);
      } catch (err: unknown) {
        await handleCliError(err);
      }
    });

  return program;
}

const program = createProgram();

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: ReflectSchemaError;
  if (isReflectSchemaError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError({
      message: message || 'Unexpected error',
      cause: err instanceof Error ? err : undefined,
    });
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
