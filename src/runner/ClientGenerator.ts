import { spawn } from "node:child_process";

export const DEFAULT_GENERATOR_COMMAND = "kiota";
export const DEFAULT_CLIENT_LANGUAGE = "typescript";

export type GeneratorResult = { exitCode: number | null; stdout: string; stderr: string };

export interface ClientGenerationRequest {
    openApiFile: string;
    outputDirectory: string;
    language: string;
}

export interface ClientGenerator {
    generate(request: ClientGenerationRequest): Promise<GeneratorResult>;
}

export function buildGeneratorArguments(request: ClientGenerationRequest): string[] {
    return ["generate", "-l", request.language, "-d", request.openApiFile, "-o", request.outputDirectory];
}

/**
 * Runs an external client generator (kiota by default) and collects its
 * output. A process that cannot be started resolves with a null exit code.
 */
export class ProcessClientGenerator implements ClientGenerator {
    constructor(private readonly command: string = DEFAULT_GENERATOR_COMMAND) {}

    generate(request: ClientGenerationRequest): Promise<GeneratorResult> {
        return new Promise((resolve) => {
            const child = spawn(this.command, buildGeneratorArguments(request), { env: process.env });
            let stdout = "";
            let stderr = "";

            child.stdout.on("data", (chunk: Buffer) => {
                stdout += chunk.toString();
            });

            child.stderr.on("data", (chunk: Buffer) => {
                stderr += chunk.toString();
            });

            child.on("close", (code) => {
                resolve({ exitCode: code, stdout, stderr });
            });

            child.on("error", (error) => {
                resolve({ exitCode: null, stdout, stderr: `${stderr}\n${error.message}` });
            });
        });
    }
}
