export * from "./conversation";
export * from "./extractionSession";
export * from "./prompts";
