export * from "./master-model";
export * from "./validation";
