export * from "./model-constants";
