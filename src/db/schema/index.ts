export * from "./orders"
