export * from "./gce-config";
export * from "./gce-cloud";
export * from "./gce-api-target";
export * from "./context";
export * from "./managers";
export * from "./utils";
export * from "./tasks";
