export const WSDL_11_NS = "http://schemas.xmlsoap.org/wsdl/";
export const XML_SCHEMA_NS = "http://www.w3.org/2001/XMLSchema";
export const XML_NS = "http://www.w3.org/XML/1998/namespace";
