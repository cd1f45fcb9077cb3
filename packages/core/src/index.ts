export * from "./errors";
export * from "./changes";
export * from "./resources";
export * from "./registry";
export * from "./task";
export * from "./delta-runner";
