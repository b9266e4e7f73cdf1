export const ORDER_SERVICE_URL = "http://example.test/orders/service.wsdl";

const XS = 'xmlns:xs="http://www.w3.org/2001/XMLSchema"';
const WSDL = 'xmlns:wsdl="http://schemas.xmlsoap.org/wsdl/"';
const SOAP = 'xmlns:soap="http://schemas.xmlsoap.org/wsdl/soap/"';

export function wsdlDocument(body: string, attributes = 'targetNamespace="urn:test" xmlns:tns="urn:test"'): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<wsdl:definitions ${WSDL} ${SOAP} ${XS} ${attributes}>
${body}
</wsdl:definitions>`;
}

export function schemaDocument(body: string, attributes = 'targetNamespace="urn:test" xmlns:tns="urn:test"'): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<xs:schema ${XS} ${attributes}>
${body}
</xs:schema>`;
}

export const ORDER_SERVICE_WSDL = wsdlDocument(
  `  <wsdl:types>
    <xs:schema targetNamespace="urn:orders" elementFormDefault="qualified">
      <xs:complexType name="Address">
        <xs:sequence>
          <xs:element name="street" type="xs:string"/>
          <xs:element name="zip" type="xs:int"/>
        </xs:sequence>
      </xs:complexType>
      <xs:complexType name="Customer">
        <xs:sequence>
          <xs:element name="name" type="xs:string"/>
          <xs:element name="address" type="tns:Address"/>
        </xs:sequence>
      </xs:complexType>
      <xs:complexType name="Order">
        <xs:sequence>
          <xs:element name="id" type="xs:long"/>
          <xs:element name="customer" type="tns:Customer"/>
          <xs:element name="total" type="xs:decimal"/>
        </xs:sequence>
      </xs:complexType>
      <xs:element name="GetOrderRequest">
        <xs:complexType>
          <xs:sequence>
            <xs:element name="orderId" type="xs:long"/>
            <xs:element name="includeLines" type="xs:boolean" minOccurs="0"/>
          </xs:sequence>
        </xs:complexType>
      </xs:element>
      <xs:element name="CreateOrderRequest">
        <xs:complexType>
          <xs:sequence>
            <xs:element name="customer" type="tns:Customer"/>
            <xs:element name="note" type="xs:string"/>
          </xs:sequence>
        </xs:complexType>
      </xs:element>
      <xs:element name="Order" type="tns:Order"/>
    </xs:schema>
  </wsdl:types>
  <wsdl:message name="GetOrderInput">
    <wsdl:part name="parameters" element="tns:GetOrderRequest"/>
  </wsdl:message>
  <wsdl:message name="OrderOutput">
    <wsdl:part name="parameters" element="tns:Order"/>
  </wsdl:message>
  <wsdl:message name="CreateOrderInput">
    <wsdl:part name="parameters" element="tns:CreateOrderRequest"/>
  </wsdl:message>
  <wsdl:message name="PingInput"/>
  <wsdl:portType name="OrderPort">
    <wsdl:operation name="GetOrder">
      <wsdl:input message="tns:GetOrderInput"/>
      <wsdl:output message="tns:OrderOutput"/>
    </wsdl:operation>
    <wsdl:operation name="CreateOrder">
      <wsdl:documentation>Creates an order</wsdl:documentation>
      <wsdl:input message="tns:CreateOrderInput"/>
      <wsdl:output message="tns:OrderOutput"/>
    </wsdl:operation>
    <wsdl:operation name="Ping">
      <wsdl:documentation> post </wsdl:documentation>
      <wsdl:input message="tns:PingInput"/>
    </wsdl:operation>
  </wsdl:portType>
  <wsdl:binding name="OrderBinding" type="tns:OrderPort">
    <soap:binding style="document" transport="http://schemas.xmlsoap.org/soap/http"/>
    <wsdl:operation name="GetOrder"/>
    <wsdl:operation name="CreateOrder"/>
    <wsdl:operation name="Ping"/>
  </wsdl:binding>
  <wsdl:service name="OrderService">
    <wsdl:port name="OrderServicePort" binding="tns:OrderBinding">
      <soap:address location="http://example.test/orders/endpoint"/>
    </wsdl:port>
  </wsdl:service>`,
  'name="OrderService" targetNamespace="urn:orders" xmlns:tns="urn:orders"',
);
