export * from "./types";
export { finite, streaming } from "./coefficients";
