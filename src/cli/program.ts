import { readFile, writeFile } from "node:fs/promises";
import { Command, InvalidArgumentError } from "commander";
import { DEFAULT_FETCH_TIMEOUT_MS } from "../converter/DocumentFetcher";
import type { ConversionOptions } from "../converter/ConversionContext";
import { isOutputFormat, OUTPUT_FORMATS, serializeOpenApiDocument } from "../converter/openapi/OpenApiSerializer";
import type { OutputFormat } from "../converter/openapi/OpenApiSerializer";
import { WsdlToOpenApiConverter } from "../converter/WsdlToOpenApiConverter";
import { DEFAULT_CLIENT_LANGUAGE, DEFAULT_GENERATOR_COMMAND, ProcessClientGenerator } from "../runner/ClientGenerator";
import { DEFAULT_OUTPUT_DIRECTORY, RegenerationRunner } from "../runner/RegenerationRunner";
import type { RegenerationRunnerOptions, SchemaConverter } from "../runner/RegenerationRunner";
import { DEFAULT_CONFIG_FILE, parseRunnerConfig } from "../runner/RunnerConfig";

const DEFAULT_OUTPUT_FILE = "wsdl-openapi.json";
const TIMEOUT_ENV = "WSDL_OPENAPI_TIMEOUT_MS";

type ConvertOptions = {
  format: OutputFormat;
  timeout: number;
};

type BatchOptions = {
  config: string;
  out: string;
  generator: string;
  language: string;
  skipGenerator?: boolean;
  timeout: number;
};

export interface CliDependencies {
  readFile?: (path: string) => Promise<string>;
  writeFile?: (path: string, content: string) => Promise<void>;
  createConverter?: (options: ConversionOptions) => SchemaConverter;
  createRunner?: (options: RegenerationRunnerOptions) => Pick<RegenerationRunner, "run">;
}

export function resolveDefaultTimeout(env: NodeJS.ProcessEnv = process.env): number {
  return Number.parseInt(env[TIMEOUT_ENV] ?? "", 10) || DEFAULT_FETCH_TIMEOUT_MS;
}

function parseTimeout(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Timeout must be a positive number of milliseconds.");
  }
  return parsed;
}

function parseFormat(value: string): OutputFormat {
  const normalized = value.toLowerCase();
  if (!isOutputFormat(normalized)) {
    throw new InvalidArgumentError(`Format must be one of: ${OUTPUT_FORMATS.join(", ")}.`);
  }
  return normalized;
}

export function createInterface(deps: CliDependencies = {}): Command {
  const read = deps.readFile ?? ((path: string) => readFile(path, "utf8"));
  const write = deps.writeFile ?? ((path: string, content: string) => writeFile(path, content, "utf8"));
  const createConverter =
    deps.createConverter ?? ((options: ConversionOptions): SchemaConverter => new WsdlToOpenApiConverter(options));
  const createRunner = deps.createRunner ?? ((options: RegenerationRunnerOptions) => new RegenerationRunner(options));
  const defaultTimeout = resolveDefaultTimeout();

  const program = new Command();
  program
    .name("wsdl-openapi")
    .description("Convert WSDL 1.1 service descriptions into OpenAPI 3 documents");

  program
    .command("convert")
    .description("Convert one WSDL document and everything it imports")
    .argument("<location>", "WSDL file path or http(s) URL")
    .argument("[output]", "Output file", DEFAULT_OUTPUT_FILE)
    .option("--format <format>", "Output format (json or yaml)", parseFormat, "json")
    .option("--timeout <ms>", "Fetch timeout in milliseconds", parseTimeout, defaultTimeout)
    .action(async (location: string, output: string, options: ConvertOptions) => {
      const document = await createConverter({ timeoutMs: options.timeout }).convert(location);
      await write(output, serializeOpenApiDocument(document, options.format));
      console.log(`OpenAPI document written to ${output}`);
    });

  program
    .command("batch")
    .description("Convert every configured WSDL and regenerate clients whose contract changed")
    .option("--config <file>", "JSON array of WSDL locations", DEFAULT_CONFIG_FILE)
    .option("--out <dir>", "Output directory", DEFAULT_OUTPUT_DIRECTORY)
    .option("--generator <command>", "Client generator command", DEFAULT_GENERATOR_COMMAND)
    .option("--language <language>", "Client language passed to the generator", DEFAULT_CLIENT_LANGUAGE)
    .option("--skip-generator", "Only write OpenAPI documents")
    .option("--timeout <ms>", "Fetch timeout in milliseconds", parseTimeout, defaultTimeout)
    .action(async (options: BatchOptions) => {
      const locations = parseRunnerConfig(await read(options.config), options.config);
      const runner = createRunner({
        outputDirectory: options.out,
        language: options.language,
        converter: createConverter({ timeoutMs: options.timeout }),
        generator: options.skipGenerator ? undefined : new ProcessClientGenerator(options.generator)
      });
      const results = await runner.run(locations);
      const failed = results.filter((result) => result.status === "failed").length;
      console.log(`${results.length - failed} of ${results.length} location(s) processed`);
      if (failed > 0) {
        throw new Error(`${failed} location(s) failed`);
      }
    });

  return program;
}
