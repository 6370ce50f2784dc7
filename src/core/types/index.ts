export * from "./crawl";
export * from "./fetch";
export * from "./signals";
