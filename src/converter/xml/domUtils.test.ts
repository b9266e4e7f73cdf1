import { parseXmlDocument, requireDocumentElement } from "./XmlDocumentParser";
import { childElements, getTextContent, lookupNamespace, resolveQualifiedName } from "./domUtils";

const SAMPLE = `<root xmlns="urn:default" xmlns:a="urn:a">
  <a:child xmlns:b="urn:b">
    <a:leaf>  text  </a:leaf>
  </a:child>
  <a:child/>
</root>`;

describe("domUtils", () => {
  const root = requireDocumentElement(parseXmlDocument(SAMPLE), "sample.xml");
  const [first, second] = childElements(root, "urn:a", "child");
  const [leaf] = childElements(first, "urn:a", "leaf");

  test("childElements filters by namespace and local name", () => {
    expect(childElements(root, "urn:a", "child")).toHaveLength(2);
    expect(childElements(root, "urn:default", "child")).toHaveLength(0);
    expect(second.localName).toBe("child");
  });

  test("lookupNamespace walks up the ancestors", () => {
    expect(lookupNamespace(leaf, "b")).toBe("urn:b");
    expect(lookupNamespace(leaf, "a")).toBe("urn:a");
    expect(lookupNamespace(leaf, "")).toBe("urn:default");
    expect(lookupNamespace(second, "b")).toBeUndefined();
    expect(lookupNamespace(leaf, "xml")).toBe("http://www.w3.org/XML/1998/namespace");
  });

  test("resolveQualifiedName handles prefixed and unprefixed values", () => {
    expect(resolveQualifiedName(leaf, "b:Thing")).toEqual({ namespace: "urn:b", name: "Thing" });
    expect(resolveQualifiedName(leaf, "Thing")).toEqual({ namespace: "urn:default", name: "Thing" });
    expect(resolveQualifiedName(leaf, "  ")).toBeUndefined();
    expect(resolveQualifiedName(leaf, "b:")).toBeUndefined();
    expect(resolveQualifiedName(leaf, null)).toBeUndefined();
  });

  test("resolveQualifiedName uses the fallback without a default namespace", () => {
    const bare = requireDocumentElement(parseXmlDocument("<r/>"), "bare.xml");
    expect(resolveQualifiedName(bare, "Thing", "urn:fallback")).toEqual({ namespace: "urn:fallback", name: "Thing" });
    expect(resolveQualifiedName(bare, "Thing")).toEqual({ namespace: undefined, name: "Thing" });
  });

  test("getTextContent trims text", () => {
    expect(getTextContent(leaf)).toBe("text");
    expect(getTextContent(second)).toBeUndefined();
  });

  test("parseXmlDocument rejects malformed XML", () => {
    expect(() => parseXmlDocument("<root><open></root>")).toThrow(/^Malformed XML: /);
  });

  test("parseXmlDocument ignores a leading byte order mark", () => {
    const document = parseXmlDocument("\uFEFF<?xml version=\"1.0\" encoding=\"UTF-8\"?><a:root xmlns:a=\"urn:a\"/>");
    const bomRoot = requireDocumentElement(document, "bom.xml");

    expect(bomRoot.localName).toBe("root");
    expect(bomRoot.namespaceURI).toBe("urn:a");
  });
});
