export * from "./errors";
export * from "./scopes";
export * from "./urls";
