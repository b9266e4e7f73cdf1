import { DOMParser, onErrorStopParsing } from "@xmldom/xmldom";
import type { Document, Element } from "@xmldom/xmldom";
import { describeError } from "../conversionErrors";

const BYTE_ORDER_MARK = "\uFEFF";

/**
 * Parses XML text into a namespace-aware DOM. Errors and fatal errors reported
 * by the parser stop parsing instead of producing a partial tree. A leading
 * byte order mark is ignored.
 */
export function parseXmlDocument(content: string): Document {
    const text = content.startsWith(BYTE_ORDER_MARK) ? content.slice(BYTE_ORDER_MARK.length) : content;
    const parser = new DOMParser({ onError: onErrorStopParsing });
    try {
        return parser.parseFromString(text, "text/xml");
    } catch (error) {
        throw new Error(`Malformed XML: ${describeError(error)}`, { cause: error });
    }
}

export function requireDocumentElement(document: Document, location: string): Element {
    const root = document.documentElement;
    if (!root) {
        throw new Error(`Document ${location} has no root element`);
    }
    return root;
}
