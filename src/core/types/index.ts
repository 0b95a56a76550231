export * from "./config";
export * from "./driver";
export * from "./sale";
export * from "./listing";
