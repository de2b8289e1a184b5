export * from "./errors";
export * from "./tls";
export * from "./connection";
export * from "./client";
export * from "./roles";
export * from "./identity";
export * from "./reconcile";
export * from "./definition";
