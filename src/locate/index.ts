export * from "./tableLocator";
