export * from "./terraform-config";
export * from "./terraform-target";
