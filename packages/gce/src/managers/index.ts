export * from "./interfaces";
export * from "./gce-operation-manager";
