export * from "./launcher";
export * from "./optimization";
export * from "./render-handle";
export * from "./renderer";
