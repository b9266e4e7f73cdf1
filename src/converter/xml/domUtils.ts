import type { Element, Node } from "@xmldom/xmldom";
import type { QualifiedName } from "../xsd/XsdTypes";
import { XML_NS } from "./namespaces";

const ELEMENT_NODE = 1;

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function forEachChildElement(
  element: Element,
  visitor: (element: Element) => void,
): void {
  let current = element.firstChild;
  while (current) {
    if (isElement(current)) {
      visitor(current);
    }
    current = current.nextSibling;
  }
}

export function childElements(
  element: Element,
  namespace: string,
  localName: string,
): Element[] {
  const result: Element[] = [];
  forEachChildElement(element, (child) => {
    if (child.namespaceURI === namespace && child.localName === localName) {
      result.push(child);
    }
  });
  return result;
}

export function findFirstChildElement(
  element: Element,
  namespace: string,
  localName: string,
): Element | undefined {
  let current = element.firstChild;
  while (current) {
    if (
      isElement(current) &&
      current.namespaceURI === namespace &&
      current.localName === localName
    ) {
      return current;
    }
    current = current.nextSibling;
  }
  return undefined;
}

export function getNonEmptyAttribute(
  element: Element,
  name: string,
): string | undefined {
  const value = element.getAttribute(name)?.trim();
  return value ? value : undefined;
}

/**
 * Looks up the namespace bound to `prefix` on the element or its ancestors.
 * An empty prefix asks for the default namespace.
 */
export function lookupNamespace(
  element: Element,
  prefix: string,
): string | undefined {
  if (prefix === "xml") {
    return XML_NS;
  }
  const attributeName = prefix ? `xmlns:${prefix}` : "xmlns";
  let current: Node | null = element;
  while (current && isElement(current)) {
    if (current.hasAttribute(attributeName)) {
      return current.getAttribute(attributeName) || undefined;
    }
    current = current.parentNode;
  }
  return undefined;
}

/**
 * Resolves a `prefix:local` attribute value against the namespace
 * declarations in scope. Unprefixed names take the default namespace, or
 * `fallbackNamespace` when none is declared.
 */
export function resolveQualifiedName(
  element: Element,
  value: string | null | undefined,
  fallbackNamespace?: string,
): QualifiedName | undefined {
  const trimmed = value?.trim();
  if (!trimmed) {
    return undefined;
  }
  const separator = trimmed.indexOf(":");
  if (separator >= 0) {
    const name = trimmed.substring(separator + 1);
    if (!name) {
      return undefined;
    }
    return {
      namespace: lookupNamespace(element, trimmed.substring(0, separator)),
      name,
    };
  }
  return {
    namespace: lookupNamespace(element, "") ?? fallbackNamespace,
    name: trimmed,
  };
}

export function getTextContent(element: Element): string | undefined {
  const text = element.textContent?.trim();
  return text ? text : undefined;
}
