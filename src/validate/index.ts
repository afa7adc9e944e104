export * from "./amounts";
export * from "./balanceSheetRule";
export * from "./financialValidator";
export * from "./types";
