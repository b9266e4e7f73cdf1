import { InMemoryDocumentFetcher } from "../__fixtures__/InMemoryDocumentFetcher";
import { wsdlDocument } from "../__fixtures__/documents";
import { createConversionContext } from "../ConversionContext";
import { DocumentLoadError } from "../conversionErrors";
import { XML_SCHEMA_NS } from "../xml/namespaces";
import { mergeInterfaceDocuments } from "./WsdlLoader";

const ROOT_URL = "http://example.test/wsdl/service.wsdl";
const MESSAGES_URL = "http://example.test/wsdl/parts/messages.wsdl";

const ROOT = wsdlDocument(
  `  <wsdl:import namespace="urn:test" location="parts/messages.wsdl"/>
  <wsdl:message name="Shared">
    <wsdl:part name="body" element="tns:A"/>
  </wsdl:message>
  <wsdl:portType name="P">
    <wsdl:operation name="Op">
      <wsdl:documentation>
        Reads things
      </wsdl:documentation>
      <wsdl:input message="tns:Shared"/>
      <wsdl:output message="tns:Extra"/>
    </wsdl:operation>
  </wsdl:portType>`,
  'name="Root" targetNamespace="urn:test" xmlns:tns="urn:test"',
);

const MESSAGES = wsdlDocument(
  `  <wsdl:import namespace="urn:test" location="../service.wsdl"/>
  <wsdl:types>
    <xs:schema targetNamespace="urn:test">
      <xs:element name="A" type="xs:string"/>
    </xs:schema>
  </wsdl:types>
  <wsdl:message name="Shared">
    <wsdl:part name="other" type="xs:string"/>
  </wsdl:message>
  <wsdl:message name="Extra">
    <wsdl:part name="value" type="xs:int"/>
  </wsdl:message>
  <wsdl:binding name="B" type="tns:P">
    <wsdl:operation name="Op"/>
  </wsdl:binding>
  <wsdl:service name="S">
    <wsdl:port name="SPort" binding="tns:B">
      <soap12:address location="http://example.test/endpoint"/>
    </wsdl:port>
  </wsdl:service>`,
  'name="Messages" targetNamespace="urn:test" xmlns:tns="urn:test" xmlns:soap12="http://schemas.xmlsoap.org/wsdl/soap12/"',
);

describe("mergeInterfaceDocuments", () => {
  let log: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    log.mockRestore();
  });

  test("loads each document of an import cycle once and merges by name", async () => {
    const fetcher = new InMemoryDocumentFetcher({ [ROOT_URL]: ROOT, [MESSAGES_URL]: MESSAGES });
    const context = createConversionContext({ fetcher });

    const { definitions, schemasByBase } = await mergeInterfaceDocuments(new URL(ROOT_URL), context);

    expect(fetcher.requested).toEqual([ROOT_URL, MESSAGES_URL]);
    expect(definitions.name).toBe("Root");
    expect(definitions.targetNamespace).toBe("urn:test");
    expect(definitions.messages).toEqual([
      { name: "Shared", namespace: "urn:test", parts: [{ name: "body", element: { namespace: "urn:test", name: "A" } }] },
      { name: "Extra", namespace: "urn:test", parts: [{ name: "value", type: { namespace: XML_SCHEMA_NS, name: "int" } }] },
    ]);
    expect(definitions.portTypes).toEqual([
      {
        name: "P",
        operations: [
          {
            name: "Op",
            documentation: "Reads things",
            input: { namespace: "urn:test", name: "Shared" },
            output: { namespace: "urn:test", name: "Extra" },
          },
        ],
      },
    ]);
    expect(definitions.bindings).toEqual([
      { name: "B", type: { namespace: "urn:test", name: "P" }, operations: ["Op"] },
    ]);
    expect(definitions.services).toEqual([
      {
        name: "S",
        endpoints: [
          { name: "SPort", binding: { namespace: "urn:test", name: "B" }, address: "http://example.test/endpoint" },
        ],
      },
    ]);
    expect(Array.from(schemasByBase.keys())).toEqual([MESSAGES_URL]);
    expect(schemasByBase.get(MESSAGES_URL)?.map((entry) => entry.key)).toEqual([`${MESSAGES_URL}#types[0]`]);
    expect(log).toHaveBeenCalledWith("[WsdlLoader] Loaded", 2, "WSDL document(s) from", ROOT_URL);
  });

  test("a missing imported document aborts the conversion", async () => {
    const fetcher = new InMemoryDocumentFetcher({ [ROOT_URL]: ROOT });
    const context = createConversionContext({ fetcher });

    const result = mergeInterfaceDocuments(new URL(ROOT_URL), context);

    await expect(result).rejects.toBeInstanceOf(DocumentLoadError);
    await expect(result).rejects.toThrow(
      `Failed to load WSDL document ${MESSAGES_URL}: Not found: ${MESSAGES_URL}`,
    );
  });

  test("a root that is not a WSDL definitions element is rejected", async () => {
    const fetcher = new InMemoryDocumentFetcher({ [ROOT_URL]: "<definitions/>" });
    const context = createConversionContext({ fetcher });

    await expect(mergeInterfaceDocuments(new URL(ROOT_URL), context)).rejects.toThrow(
      `Failed to load WSDL document ${ROOT_URL}: root element is not a WSDL 1.1 definitions element`,
    );
  });

  test("malformed XML is reported with the document location", async () => {
    const fetcher = new InMemoryDocumentFetcher({ [ROOT_URL]: "<definitions><open></definitions>" });
    const context = createConversionContext({ fetcher });

    await expect(mergeInterfaceDocuments(new URL(ROOT_URL), context)).rejects.toThrow(
      `Failed to load WSDL document ${ROOT_URL}: Malformed XML: `,
    );
  });
});
