export * from "./gce-operation-manager.interface";
