export * from "./types";
export * from "./entry-pool";
export * from "./spin-engine";
export * from "./claim-window";
export * from "./prize-ledger";
export * from "./reader";
export * from "./engine";
