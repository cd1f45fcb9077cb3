export * from "./references";
export * from "./instance";
export * from "./instance-spec";
export * from "./instance-terraform";
