import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

export interface DocumentFetcher {
    fetchText(location: URL): Promise<string>;
}

/**
 * Reads `file:` locations from disk and `http(s):` locations over the network.
 */
export class DefaultDocumentFetcher implements DocumentFetcher {
    constructor(private readonly timeoutMs: number = DEFAULT_FETCH_TIMEOUT_MS) {}

    async fetchText(location: URL): Promise<string> {
        switch (location.protocol) {
            case "file:":
                return readFile(fileURLToPath(location), "utf8");
            case "http:":
            case "https:":
                return this.fetchRemote(location);
            default:
                throw new Error(`Unsupported location scheme: ${location.protocol}`);
        }
    }

    private async fetchRemote(location: URL): Promise<string> {
        const response = await fetch(location, {
            signal: AbortSignal.timeout(this.timeoutMs)
        });
        if (!response.ok) {
            await response.body?.cancel();
            throw new Error(`HTTP ${response.status} ${response.statusText} for ${location.href}`);
        }
        return response.text();
    }
}
