export * from "./ClientGenerator";
export * from "./RegenerationRunner";
export * from "./RunnerConfig";
