import Ajv from "ajv";
import type { ErrorObject, JSONSchemaType } from "ajv";
import { ConfigurationError, describeError } from "../converter/conversionErrors";

export const DEFAULT_CONFIG_FILE = "wsdls.json";
export const STATE_FILE_NAME = "generator-state.json";

/** Content hash of the last successfully generated client, per output name. */
export type GeneratorState = Record<string, string>;

const LOCATIONS_SCHEMA: JSONSchemaType<string[]> = {
    type: "array",
    items: { type: "string", pattern: "\\S" }
};

const STATE_SCHEMA: JSONSchemaType<GeneratorState> = {
    type: "object",
    required: [],
    additionalProperties: { type: "string" }
};

const ajv = new Ajv({ allErrors: true });
const validateLocations = ajv.compile(LOCATIONS_SCHEMA);
const validateState = ajv.compile(STATE_SCHEMA);

function formatErrors(errors: ErrorObject[] | null | undefined): string {
    if (!errors || errors.length === 0) {
        return "unknown validation error";
    }
    return errors
        .map((error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`)
        .join("; ");
}

function parseJson(content: string, source: string): unknown {
    try {
        return JSON.parse(content);
    } catch (error) {
        throw new ConfigurationError(source, describeError(error));
    }
}

/**
 * Parses the batch configuration: a JSON array of WSDL locations (paths or
 * URLs). Entries are trimmed; blank entries are rejected.
 */
export function parseRunnerConfig(content: string, source: string): string[] {
    const data = parseJson(content, source);
    if (!validateLocations(data)) {
        throw new ConfigurationError(source, formatErrors(validateLocations.errors));
    }
    return data.map((location) => location.trim());
}

export function parseGeneratorState(content: string, source: string): GeneratorState {
    const data = parseJson(content, source);
    if (!validateState(data)) {
        throw new ConfigurationError(source, formatErrors(validateState.errors));
    }
    return data;
}

export function serializeGeneratorState(state: GeneratorState): string {
    return JSON.stringify(state, null, 2);
}
