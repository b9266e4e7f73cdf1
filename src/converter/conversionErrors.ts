export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Raised when the root WSDL document, or any WSDL it imports, cannot be
 * fetched or parsed. Conversion stops without partial output.
 */
export class DocumentLoadError extends Error {
    readonly location: string;

    constructor(location: string, cause: unknown) {
        super(`Failed to load WSDL document ${location}: ${describeError(cause)}`, { cause });
        this.name = "DocumentLoadError";
        this.location = location;
    }
}

export class ConfigurationError extends Error {
    readonly source: string;

    constructor(source: string, message: string) {
        super(`Invalid configuration in ${source}: ${message}`);
        this.name = "ConfigurationError";
        this.source = source;
    }
}
