export type SchemaType = "string" | "integer" | "number" | "boolean" | "array" | "object";

export interface SchemaObject {
  type?: SchemaType;
  format?: string;
  enum?: string[];
  properties?: Record<string, SchemaObject>;
  items?: SchemaObject;
  $ref?: string;
}

export interface ParameterObject {
  name: string;
  in: "query";
  required: boolean;
  schema: SchemaObject;
}

export interface MediaTypeObject {
  schema: SchemaObject;
}

export interface RequestBodyObject {
  content: Record<string, MediaTypeObject>;
}

export interface ResponseObject {
  description: string;
  content?: Record<string, MediaTypeObject>;
}

export interface OperationObject {
  summary?: string;
  parameters: ParameterObject[];
  requestBody?: RequestBodyObject;
  responses: Record<string, ResponseObject>;
}

export type HttpMethod = "get" | "post";

export type PathItemObject = Partial<Record<HttpMethod, OperationObject>>;

export interface OpenApiDocument {
  openapi: "3.0.3";
  info: {
    title: string;
    version: string;
  };
  paths: Record<string, PathItemObject>;
  components: {
    schemas: Record<string, SchemaObject>;
  };
}

export const JSON_MEDIA_TYPE = "application/json";

export function componentRef(name: string): SchemaObject {
  return { $ref: `#/components/schemas/${name}` };
}

export function arrayOf(items: SchemaObject): SchemaObject {
  return { type: "array", items };
}

/**
 * Adds an own enumerable entry, so keys such as `__proto__` or `constructor`
 * become plain properties of the output.
 */
export function setOwnProperty<T>(record: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true });
}
