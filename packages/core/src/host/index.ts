export * from "./types";
export { HostedAlgorithm } from "./HostedAlgorithm";
export { applyOrderActions } from "./applyOrderActions";
