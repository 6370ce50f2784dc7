export * from "./crawl-config";
export * from "./env";
