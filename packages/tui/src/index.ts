// Components
export * from "./components/loader";
export * from "./components/scroll-view";
export * from "./components/stream-viewport";
// Viewport core
export * from "./config";
export * from "./content-buffer";
export * from "./debounce";
// Producer plumbing
export * from "./stream";
// Terminal interface and implementations
export * from "./terminal";
export * from "./theme";
export * from "./tui";
// Utilities
export * from "./utils";
export * from "./wrap";
export * from "./wrap-cache";
