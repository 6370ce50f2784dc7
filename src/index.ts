/**
 * Public API of the product URL crawler
 */

export * from "./core/index";
