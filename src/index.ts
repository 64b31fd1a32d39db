export { InvalidParameterError } from "./errors";
export * from "./filters";
export * from "./generators";
