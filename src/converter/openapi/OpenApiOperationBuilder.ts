import { sanitizePathSegment } from "../pathUtils";
import type { WsdlDefinitions, WsdlMessage, WsdlMessagePart, WsdlOperation, WsdlPortType } from "../wsdl/WsdlTypes";
import type { XmlSchemaStore } from "../xsd/XmlSchemaStore";
import { isStructuredType } from "../xsd/XsdTypes";
import type { QualifiedName, XsdElement, XsdStructuredType, XsdType } from "../xsd/XsdTypes";
import type { OpenApiSchemaGenerator } from "./OpenApiSchemaGenerator";
import { arrayOf, JSON_MEDIA_TYPE } from "./OpenApiTypes";
import type {
    HttpMethod,
    OperationObject,
    ParameterObject,
    PathItemObject,
    RequestBodyObject,
    ResponseObject,
    SchemaObject
} from "./OpenApiTypes";

const SUCCESS_STATUS = "200";
const POST_DOCUMENTATION_MARKER = "post";

export interface BuiltOperation {
    path: string;
    method: HttpMethod;
    operation: OperationObject;
}

interface ResolvedPart {
    element?: XsdElement;
    type?: XsdType;
}

/**
 * Builds one OpenAPI operation per WSDL port type operation. Inputs become
 * query parameters while they stay shallow; deeper inputs move into a JSON
 * request body and turn the operation into a POST.
 */
export class OpenApiOperationBuilder {
    constructor(
        private readonly definitions: WsdlDefinitions,
        private readonly store: XmlSchemaStore,
        private readonly generator: OpenApiSchemaGenerator
    ) {}

    buildPaths(): Record<string, PathItemObject> {
        const paths: Record<string, PathItemObject> = {};
        this.definitions.portTypes.forEach((portType) => {
            portType.operations.forEach((operation) => {
                const built = this.buildOperation(portType, operation);
                if (paths[built.path]) {
                    console.warn("[OpenApiOperationBuilder] Path", built.path, "is defined twice; keeping the last operation");
                }
                const pathItem: PathItemObject = {};
                pathItem[built.method] = built.operation;
                paths[built.path] = pathItem;
            });
        });
        return paths;
    }

    buildOperation(portType: WsdlPortType, wsdlOperation: WsdlOperation): BuiltOperation {
        const path = `/${sanitizePathSegment(portType.name)}/${sanitizePathSegment(wsdlOperation.name)}`;
        let method: HttpMethod = "get";
        const parameters: ParameterObject[] = [];
        let requestBody: RequestBodyObject | undefined;

        const inputMessage = this.findMessage(wsdlOperation.input);
        if (inputMessage) {
            let requiresBody = false;
            for (const part of inputMessage.parts) {
                const bodySchema = this.addPartInputs(part, parameters);
                if (bodySchema) {
                    requiresBody = true;
                    requestBody = this.createRequestBody(bodySchema);
                }
            }
            if (requiresBody) {
                method = "post";
                requestBody ??= this.createRequestBody();
            }
        }

        if (wsdlOperation.documentation?.trim().toLowerCase() === POST_DOCUMENTATION_MARKER) {
            method = "post";
            requestBody ??= this.createRequestBody();
        }

        const operation: OperationObject = {
            parameters,
            responses: { [SUCCESS_STATUS]: this.buildResponse(wsdlOperation.output) }
        };
        if (wsdlOperation.documentation) {
            operation.summary = wsdlOperation.documentation;
        }
        if (requestBody) {
            operation.requestBody = requestBody;
        }

        return { path, method, operation };
    }

    /**
     * Structural depth of a type: 0 for simple or unknown types, otherwise one
     * more than the deepest sequence (or extension sequence) child. A type
     * already on the current path counts as one level.
     */
    computeDepth(type: XsdType | undefined, ancestors: Set<XsdStructuredType> = new Set()): number {
        if (!isStructuredType(type) || type.kind === "choice") {
            return 0;
        }
        ancestors.add(type);
        let max = 0;
        type.elements.forEach((child) => {
            const childType = this.store.resolveElementType(child);
            const childDepth =
                isStructuredType(childType) && ancestors.has(childType)
                    ? 1
                    : this.computeDepth(childType, ancestors);
            max = Math.max(max, 1 + childDepth);
        });
        ancestors.delete(type);
        return max;
    }

    /**
     * Adds the query parameters for one input part. Returns the body schema
     * when the part is too deep to flatten.
     */
    private addPartInputs(part: WsdlMessagePart, parameters: ParameterObject[]): SchemaObject | undefined {
        const { element, type } = this.resolvePart(part);
        const parameterName = part.name ?? element?.name ?? "parameters";

        if (element && element.maxOccurs > 1) {
            parameters.push(this.createQueryParameter(parameterName, arrayOf(this.generator.synthesizeSchema(type))));
            return undefined;
        }

        if (!isStructuredType(type)) {
            parameters.push(this.createQueryParameter(parameterName, this.generator.synthesizeSchema(type)));
            return undefined;
        }

        if (this.computeDepth(type) <= 1) {
            type.elements.forEach((child) => {
                const schema = this.generator.mapSimpleType(this.store.resolveElementType(child));
                parameters.push(this.createQueryParameter(child.name, child.maxOccurs > 1 ? arrayOf(schema) : schema));
            });
            return undefined;
        }

        return this.generator.synthesizeSchema(type);
    }

    private buildResponse(outputRef: QualifiedName | undefined): ResponseObject {
        if (!outputRef) {
            return { description: "No output message" };
        }
        const outputMessage = this.findMessage(outputRef);
        if (!outputMessage || outputMessage.parts.length === 0) {
            return { description: "No content" };
        }
        return {
            description: "Successful response",
            content: {
                [JSON_MEDIA_TYPE]: { schema: this.buildSchemaForMessagePart(outputMessage.parts[0]) }
            }
        };
    }

    private buildSchemaForMessagePart(part: WsdlMessagePart): SchemaObject {
        const { element, type } = this.resolvePart(part);
        const schema = this.generator.synthesizeSchema(type);
        return element && element.maxOccurs > 1 ? arrayOf(schema) : schema;
    }

    private resolvePart(part: WsdlMessagePart): ResolvedPart {
        if (part.element) {
            const element = this.store.findGlobalElement(part.element);
            return { element, type: element ? this.store.resolveElementType(element) : undefined };
        }
        if (part.type) {
            return { type: this.store.resolveType(part.type) };
        }
        return {};
    }

    private findMessage(messageRef: QualifiedName | undefined): WsdlMessage | undefined {
        if (!messageRef) {
            return undefined;
        }
        return this.definitions.messages.find((message) => message.name === messageRef.name);
    }

    private createQueryParameter(name: string, schema: SchemaObject): ParameterObject {
        return { name, in: "query", required: false, schema };
    }

    private createRequestBody(schema: SchemaObject = { type: "object" }): RequestBodyObject {
        return { content: { [JSON_MEDIA_TYPE]: { schema } } };
    }
}
