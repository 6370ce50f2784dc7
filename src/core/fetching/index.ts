export * from "./capability";
export * from "./http-fetcher";
export * from "./retrying-fetcher";
