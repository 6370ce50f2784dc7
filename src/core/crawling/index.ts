export * from "./domain-crawler";
export * from "./frontier";
export * from "./link-filter";
export * from "./render-heuristic";
