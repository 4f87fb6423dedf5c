/**
 * Types module index
 */

export * from "./config";
export * from "./jsonld";
export * from "./recipe";
