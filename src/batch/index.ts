export * from "./batchDriver";
export * from "./inputs";
