import { createHash } from "node:crypto";
import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { describeError } from "../converter/conversionErrors";
import { serializeOpenApiDocument } from "../converter/openapi/OpenApiSerializer";
import type { OpenApiDocument } from "../converter/openapi/OpenApiTypes";
import { deriveOutputName, toSourceLocation } from "../converter/pathUtils";
import { WsdlToOpenApiConverter } from "../converter/WsdlToOpenApiConverter";
import { DEFAULT_CLIENT_LANGUAGE } from "./ClientGenerator";
import type { ClientGenerator } from "./ClientGenerator";
import { parseGeneratorState, serializeGeneratorState, STATE_FILE_NAME } from "./RunnerConfig";
import type { GeneratorState } from "./RunnerConfig";

export const DEFAULT_OUTPUT_DIRECTORY = "Temp";

export interface RunnerFileSystem {
    readFile(path: string): Promise<string>;
    writeFile(path: string, content: string): Promise<void>;
    exists(path: string): Promise<boolean>;
    mkdir(path: string): Promise<void>;
}

export const nodeFileSystem: RunnerFileSystem = {
    readFile: (path) => readFile(path, "utf8"),
    writeFile: (path, content) => writeFile(path, content, "utf8"),
    exists: async (path) => {
        try {
            await access(path);
            return true;
        } catch {
            return false;
        }
    },
    mkdir: async (path) => {
        await mkdir(path, { recursive: true });
    }
};

export interface SchemaConverter {
    convert(location: string): Promise<OpenApiDocument>;
}

export interface RegenerationRunnerOptions {
    outputDirectory?: string;
    language?: string;
    converter?: SchemaConverter;
    /** Omit to write OpenAPI files without generating clients. */
    generator?: ClientGenerator;
    fileSystem?: RunnerFileSystem;
}

export type LocationStatus = "generated" | "unchanged" | "converted" | "failed";

export interface LocationResult {
    location: string;
    status: LocationStatus;
    outputName?: string;
    error?: string;
}

/**
 * Converts a list of WSDL locations and regenerates the client of every
 * location whose OpenAPI output changed since the last successful run.
 */
export class RegenerationRunner {
    private readonly outputDirectory: string;
    private readonly language: string;
    private readonly converter: SchemaConverter;
    private readonly generator?: ClientGenerator;
    private readonly fs: RunnerFileSystem;

    constructor(options: RegenerationRunnerOptions = {}) {
        this.outputDirectory = options.outputDirectory ?? DEFAULT_OUTPUT_DIRECTORY;
        this.language = options.language ?? DEFAULT_CLIENT_LANGUAGE;
        this.converter = options.converter ?? new WsdlToOpenApiConverter();
        this.generator = options.generator;
        this.fs = options.fileSystem ?? nodeFileSystem;
    }

    async run(locations: string[]): Promise<LocationResult[]> {
        await this.fs.mkdir(this.outputDirectory);
        const statePath = join(this.outputDirectory, STATE_FILE_NAME);
        const state = await this.loadState(statePath);

        const results: LocationResult[] = [];
        for (const location of locations) {
            try {
                results.push(await this.processLocation(location, state));
            } catch (error) {
                console.error("[RegenerationRunner] Failed to process", location, "-", describeError(error));
                results.push({ location, status: "failed", error: describeError(error) });
            }
            await this.fs.writeFile(statePath, serializeGeneratorState(state));
        }
        return results;
    }

    private async processLocation(location: string, state: GeneratorState): Promise<LocationResult> {
        const outputName = deriveOutputName(toSourceLocation(location));
        const document = await this.converter.convert(location);
        const content = serializeOpenApiDocument(document, "json");
        const openApiFile = join(this.outputDirectory, `${outputName}.openapi.json`);
        await this.fs.writeFile(openApiFile, content);
        console.log("[RegenerationRunner] Wrote", openApiFile);

        if (!this.generator) {
            return { location, status: "converted", outputName };
        }

        const hash = createHash("md5").update(content).digest("hex");
        const clientDirectory = join(this.outputDirectory, `${outputName}_client`);
        const clientExists = await this.fs.exists(clientDirectory);
        if (state[outputName] === hash && clientExists) {
            console.log("[RegenerationRunner] No changes for", outputName, "- skipping client generation");
            return { location, status: "unchanged", outputName };
        }

        const result = await this.generator.generate({
            openApiFile,
            outputDirectory: clientDirectory,
            language: this.language
        });
        if (result.exitCode !== 0) {
            throw new Error(
                `Client generator exited with code ${result.exitCode ?? "null"}: ${result.stderr.trim()}`
            );
        }

        state[outputName] = hash;
        console.log("[RegenerationRunner] Generated client", clientDirectory);
        return { location, status: "generated", outputName };
    }

    private async loadState(statePath: string): Promise<GeneratorState> {
        if (!(await this.fs.exists(statePath))) {
            return {};
        }
        return parseGeneratorState(await this.fs.readFile(statePath), statePath);
    }
}
