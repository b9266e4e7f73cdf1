import { storeFromSchema, structuredType, testName } from "../__fixtures__/schemaStore";
import { XML_SCHEMA_NS } from "../xml/namespaces";
import { ComponentRegistry } from "./ComponentRegistry";
import { OpenApiSchemaGenerator } from "./OpenApiSchemaGenerator";

const SCHEMA = `
  <xs:simpleType name="Color">
    <xs:restriction base="xs:string">
      <xs:enumeration value="red"/>
      <xs:enumeration value="blue"/>
    </xs:restriction>
  </xs:simpleType>
  <xs:simpleType name="Shade">
    <xs:restriction base="tns:Color">
      <xs:enumeration value="red"/>
    </xs:restriction>
  </xs:simpleType>
  <xs:simpleType name="Percent">
    <xs:restriction base="xs:int"/>
  </xs:simpleType>
  <xs:complexType name="StringList">
    <xs:sequence>
      <xs:element name="item" type="xs:string" maxOccurs="unbounded"/>
    </xs:sequence>
  </xs:complexType>
  <xs:complexType name="Point">
    <xs:sequence>
      <xs:element name="x" type="xs:double"/>
      <xs:element name="y" type="xs:double"/>
    </xs:sequence>
  </xs:complexType>
  <xs:complexType name="PointList">
    <xs:sequence>
      <xs:element name="point" type="tns:Point" maxOccurs="unbounded"/>
    </xs:sequence>
  </xs:complexType>
  <xs:complexType name="PointMatrix">
    <xs:sequence>
      <xs:element name="row" type="tns:PointList"/>
    </xs:sequence>
  </xs:complexType>
  <xs:complexType name="Node">
    <xs:sequence>
      <xs:element name="label" type="xs:string"/>
      <xs:element name="next" type="tns:Node" minOccurs="0"/>
      <xs:element name="children" type="tns:Node" maxOccurs="unbounded"/>
    </xs:sequence>
  </xs:complexType>
  <xs:complexType name="Shape">
    <xs:sequence>
      <xs:element name="color" type="tns:Color"/>
      <xs:element name="origin" type="tns:Point"/>
    </xs:sequence>
  </xs:complexType>
  <xs:complexType name="Circle">
    <xs:complexContent>
      <xs:extension base="tns:Shape">
        <xs:sequence>
          <xs:element name="radius" type="xs:float"/>
          <xs:element name="tags" type="xs:string" maxOccurs="3"/>
        </xs:sequence>
      </xs:extension>
    </xs:complexContent>
  </xs:complexType>
  <xs:complexType name="Tagged">
    <xs:complexContent>
      <xs:extension base="tns:Point">
        <xs:sequence>
          <xs:element name="tag" type="xs:string"/>
        </xs:sequence>
      </xs:extension>
    </xs:complexContent>
  </xs:complexType>
  <xs:complexType name="Single">
    <xs:choice>
      <xs:element name="only" type="xs:string"/>
    </xs:choice>
  </xs:complexType>
  <xs:complexType name="Holder">
    <xs:sequence>
      <xs:element name="inner">
        <xs:complexType>
          <xs:sequence>
            <xs:element name="a" type="xs:string"/>
            <xs:element name="b" type="xs:int"/>
          </xs:sequence>
        </xs:complexType>
      </xs:element>
      <xs:element name="mystery" type="tns:Unknown"/>
    </xs:sequence>
  </xs:complexType>
  <xs:complexType name="Open">
    <xs:sequence>
      <xs:element name="id" type="xs:string"/>
      <xs:any namespace="##other" processContents="lax"/>
    </xs:sequence>
  </xs:complexType>
  <xs:complexType name="Empty"/>`;

describe("OpenApiSchemaGenerator", () => {
  let store: ReturnType<typeof storeFromSchema>;
  let registry: ComponentRegistry;
  let generator: OpenApiSchemaGenerator;

  beforeEach(() => {
    store = storeFromSchema(SCHEMA);
    registry = new ComponentRegistry();
    generator = new OpenApiSchemaGenerator(store, registry);
  });

  test.each([
    ["string", { type: "string" }],
    ["normalizedString", { type: "string" }],
    ["boolean", { type: "boolean" }],
    ["int", { type: "integer", format: "int32" }],
    ["integer", { type: "integer", format: "int32" }],
    ["short", { type: "integer", format: "int32" }],
    ["byte", { type: "integer", format: "int32" }],
    ["long", { type: "integer", format: "int64" }],
    ["decimal", { type: "number" }],
    ["double", { type: "number" }],
    ["float", { type: "number" }],
    ["dateTime", { type: "string", format: "date-time" }],
    ["date", { type: "string", format: "date" }],
    ["base64Binary", { type: "string", format: "byte" }],
    ["anyURI", { type: "string" }],
    ["duration", { type: "string" }],
  ])("maps xs:%s", (name, expected) => {
    expect(generator.synthesizeSchema(store.resolveType({ namespace: XML_SCHEMA_NS, name }))).toEqual(expected);
  });

  test("unknown types become strings", () => {
    expect(generator.synthesizeSchema(undefined)).toEqual({ type: "string" });
    expect(generator.synthesizeSchema(store.resolveType({ namespace: XML_SCHEMA_NS, name: "anyType" }))).toEqual({
      type: "string",
    });
  });

  test("declared simple types map through their base chain", () => {
    expect(generator.synthesizeSchema(store.resolveType(testName("Color")))).toEqual({
      type: "string",
      enum: ["red", "blue"],
    });
    expect(generator.synthesizeSchema(store.resolveType(testName("Shade")))).toEqual({
      type: "string",
      enum: ["red"],
    });
    expect(generator.synthesizeSchema(store.resolveType(testName("Percent")))).toEqual({
      type: "integer",
      format: "int32",
    });
  });

  test("a wrapper of a repeated string collapses into a string array", () => {
    expect(generator.synthesizeSchema(structuredType(store, "StringList"))).toEqual({
      type: "array",
      items: { type: "string" },
    });
    expect(registry.getSchemas()).toEqual({});
  });

  test("nested wrappers collapse recursively", () => {
    expect(generator.synthesizeSchema(structuredType(store, "PointMatrix"))).toEqual({
      type: "array",
      items: { type: "array", items: { $ref: "#/components/schemas/Point" } },
    });
    expect(registry.getSchemas()).toEqual({
      Point: { type: "object", properties: { x: { type: "number" }, y: { type: "number" } } },
    });
  });

  test("an extension with a single own child is a wrapper too", () => {
    expect(generator.synthesizeSchema(structuredType(store, "Tagged"))).toEqual({
      type: "array",
      items: { type: "string" },
    });
  });

  test("a single element next to a wildcard is not a wrapper", () => {
    expect(generator.synthesizeSchema(structuredType(store, "Open"))).toEqual({
      $ref: "#/components/schemas/Open",
    });
    expect(registry.getSchemas().Open).toEqual({ type: "object", properties: { id: { type: "string" } } });
  });

  test("a choice with a single child stays a component", () => {
    expect(generator.synthesizeSchema(structuredType(store, "Single"))).toEqual({
      $ref: "#/components/schemas/Single",
    });
    expect(registry.getSchemas().Single).toEqual({ type: "object", properties: { only: { type: "string" } } });
  });

  test("a structured type is expanded only once", () => {
    const resolveElementType = jest.spyOn(store, "resolveElementType");
    const point = structuredType(store, "Point");

    const first = generator.synthesizeSchema(point);
    const second = generator.synthesizeSchema(point);

    expect(first).toEqual({ $ref: "#/components/schemas/Point" });
    expect(second).toEqual(first);
    expect(resolveElementType).toHaveBeenCalledTimes(2);
    expect(Object.keys(registry.getSchemas())).toEqual(["Point"]);
  });

  test("self-referencing types refer back to their own component", () => {
    expect(generator.ensureComponent(structuredType(store, "Node"))).toBe("Node");
    expect(registry.getSchemas()).toEqual({
      Node: {
        type: "object",
        properties: {
          label: { type: "string" },
          next: { $ref: "#/components/schemas/Node" },
          children: { type: "array", items: { $ref: "#/components/schemas/Node" } },
        },
      },
    });
  });

  test("extensions reference their base through an _extends_ property", () => {
    expect(generator.synthesizeSchema(structuredType(store, "Circle"))).toEqual({
      $ref: "#/components/schemas/Circle",
    });
    const schemas = registry.getSchemas();
    expect(Object.keys(schemas)).toEqual(["Circle", "Shape", "Point"]);
    expect(schemas.Circle).toEqual({
      type: "object",
      properties: {
        _extends_Shape: { $ref: "#/components/schemas/Shape" },
        radius: { type: "number" },
        tags: { type: "array", items: { type: "string" } },
      },
    });
    expect(schemas.Shape).toEqual({
      type: "object",
      properties: {
        color: { type: "string", enum: ["red", "blue"] },
        origin: { $ref: "#/components/schemas/Point" },
      },
    });
  });

  test("anonymous types are named after the registry size", () => {
    generator.synthesizeSchema(structuredType(store, "Holder"));

    expect(registry.getSchemas()).toEqual({
      Holder: {
        type: "object",
        properties: {
          inner: { $ref: "#/components/schemas/AnonType_1" },
          mystery: { type: "string" },
        },
      },
      AnonType_1: {
        type: "object",
        properties: { a: { type: "string" }, b: { type: "integer", format: "int32" } },
      },
    });
  });

  test("names shared with Object.prototype members are kept as plain keys", () => {
    const reservedStore = storeFromSchema(`
  <xs:complexType name="constructor">
    <xs:sequence>
      <xs:element name="__proto__" type="xs:string"/>
      <xs:element name="toString" type="xs:int"/>
    </xs:sequence>
  </xs:complexType>`);
    const reservedRegistry = new ComponentRegistry();
    const reservedGenerator = new OpenApiSchemaGenerator(reservedStore, reservedRegistry);

    expect(reservedGenerator.synthesizeSchema(structuredType(reservedStore, "constructor"))).toEqual({
      $ref: "#/components/schemas/constructor",
    });
    expect(JSON.stringify(reservedRegistry.getSchemas())).toBe(
      '{"constructor":{"type":"object","properties":{"__proto__":{"type":"string"},"toString":{"type":"integer","format":"int32"}}}}',
    );
  });

  test("a complex type without modelled content is an empty object", () => {
    expect(generator.synthesizeSchema(structuredType(store, "Empty"))).toEqual({
      $ref: "#/components/schemas/Empty",
    });
    expect(registry.getSchemas().Empty).toEqual({ type: "object", properties: {} });
  });
});
