/**
 * Effect services barrel export.
 */
export * from "./CommandRunner"
export * from "./Tmux"
export * from "./Clipboard"
