export * from "./converter";
export * from "./runner";
