import type { Element } from "@xmldom/xmldom";
import {
  childElements,
  findFirstChildElement,
  forEachChildElement,
  getNonEmptyAttribute,
  getTextContent,
  resolveQualifiedName,
} from "../xml/domUtils";
import { WSDL_11_NS, XML_SCHEMA_NS } from "../xml/namespaces";
import { requireDocumentElement } from "../xml/XmlDocumentParser";
import type {
  WsdlBinding,
  WsdlDefinitions,
  WsdlEndpoint,
  WsdlMessage,
  WsdlParseResult,
  WsdlPortType,
  WsdlResource,
  WsdlSchemaEntry,
  WsdlService,
} from "./WsdlTypes";

const SOAP_11_NS = "http://schemas.xmlsoap.org/wsdl/soap/";
const SOAP_12_NS = "http://schemas.xmlsoap.org/wsdl/soap12/";

interface NamedEntry {
  name: string;
}

export class WsdlParser {
  /**
   * Merges the loaded documents in load order. The first document is the
   * root; later messages, port types, bindings and services are added only
   * when their name is not taken yet.
   */
  parse(resources: WsdlResource[]): WsdlParseResult {
    if (resources.length === 0) {
      throw new Error("No WSDL documents to parse");
    }

    const [rootResource] = resources;
    const rootElement = requireDocumentElement(
      rootResource.document,
      rootResource.location.href,
    );

    const definitions: WsdlDefinitions = {
      name: getNonEmptyAttribute(rootElement, "name"),
      targetNamespace: getNonEmptyAttribute(rootElement, "targetNamespace"),
      messages: [],
      portTypes: [],
      bindings: [],
      services: [],
    };
    const schemasByBase = new Map<string, WsdlSchemaEntry[]>();

    resources.forEach(({ document, location }) => {
      const root = requireDocumentElement(document, location.href);
      const targetNamespace = getNonEmptyAttribute(root, "targetNamespace");

      this.mergeByName(definitions.messages, this.collectMessages(root, targetNamespace));
      this.mergeByName(definitions.portTypes, this.collectPortTypes(root));
      this.mergeByName(definitions.bindings, this.collectBindings(root));
      this.mergeByName(definitions.services, this.collectServices(root));

      const schemas = this.collectSchemas(root, location);
      if (schemas.length > 0) {
        schemasByBase.set(location.href, schemas);
      }
    });

    return { definitions, schemasByBase };
  }

  private mergeByName<T extends NamedEntry>(target: T[], entries: T[]): void {
    entries.forEach((entry) => {
      if (!target.some((existing) => existing.name === entry.name)) {
        target.push(entry);
      }
    });
  }

  private collectMessages(
    root: Element,
    targetNamespace: string | undefined,
  ): WsdlMessage[] {
    const messages: WsdlMessage[] = [];
    childElements(root, WSDL_11_NS, "message").forEach((element) => {
      const name = getNonEmptyAttribute(element, "name");
      if (!name) {
        return;
      }
      const parts = childElements(element, WSDL_11_NS, "part").map(
        (partElement) => {
          const elementName = resolveQualifiedName(
            partElement,
            partElement.getAttribute("element"),
          );
          return {
            name: getNonEmptyAttribute(partElement, "name"),
            element: elementName,
            type: elementName
              ? undefined
              : resolveQualifiedName(partElement, partElement.getAttribute("type")),
          };
        },
      );
      messages.push({ name, namespace: targetNamespace, parts });
    });
    return messages;
  }

  private collectPortTypes(root: Element): WsdlPortType[] {
    const portTypes: WsdlPortType[] = [];
    childElements(root, WSDL_11_NS, "portType").forEach((element) => {
      const name = getNonEmptyAttribute(element, "name");
      if (!name) {
        return;
      }
      const operations = childElements(element, WSDL_11_NS, "operation").map(
        (operationElement) => {
          const documentation = findFirstChildElement(
            operationElement,
            WSDL_11_NS,
            "documentation",
          );
          const input = findFirstChildElement(operationElement, WSDL_11_NS, "input");
          const output = findFirstChildElement(operationElement, WSDL_11_NS, "output");
          return {
            name: operationElement.getAttribute("name") ?? "",
            documentation: documentation ? getTextContent(documentation) : undefined,
            input: input
              ? resolveQualifiedName(input, input.getAttribute("message"))
              : undefined,
            output: output
              ? resolveQualifiedName(output, output.getAttribute("message"))
              : undefined,
          };
        },
      );
      portTypes.push({ name, operations });
    });
    return portTypes;
  }

  private collectBindings(root: Element): WsdlBinding[] {
    const bindings: WsdlBinding[] = [];
    childElements(root, WSDL_11_NS, "binding").forEach((element) => {
      const name = getNonEmptyAttribute(element, "name");
      if (!name) {
        return;
      }
      bindings.push({
        name,
        type: resolveQualifiedName(element, element.getAttribute("type")),
        operations: childElements(element, WSDL_11_NS, "operation")
          .map((operation) => getNonEmptyAttribute(operation, "name"))
          .filter((operation): operation is string => operation !== undefined),
      });
    });
    return bindings;
  }

  private collectServices(root: Element): WsdlService[] {
    const services: WsdlService[] = [];
    childElements(root, WSDL_11_NS, "service").forEach((element) => {
      const name = getNonEmptyAttribute(element, "name");
      if (!name) {
        return;
      }
      const endpoints: WsdlEndpoint[] = childElements(
        element,
        WSDL_11_NS,
        "port",
      ).map((port) => ({
        name: getNonEmptyAttribute(port, "name"),
        binding: resolveQualifiedName(port, port.getAttribute("binding")),
        address: this.findAddress(port),
      }));
      services.push({ name, endpoints });
    });
    return services;
  }

  private findAddress(port: Element): string | undefined {
    let address: string | undefined;
    forEachChildElement(port, (child) => {
      if (
        !address &&
        child.localName === "address" &&
        (child.namespaceURI === SOAP_11_NS || child.namespaceURI === SOAP_12_NS)
      ) {
        address = getNonEmptyAttribute(child, "location");
      }
    });
    return address;
  }

  private collectSchemas(root: Element, location: URL): WsdlSchemaEntry[] {
    const schemas: WsdlSchemaEntry[] = [];
    childElements(root, WSDL_11_NS, "types").forEach((types) => {
      childElements(types, XML_SCHEMA_NS, "schema").forEach((element) => {
        schemas.push({
          key: `${location.href}#types[${schemas.length}]`,
          baseLocation: location,
          element,
        });
      });
    });
    return schemas;
  }
}
