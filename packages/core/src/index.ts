export * as Config from "./config_manager";
export * as Git from "./git";
export * as GitHub from "./github";
export * as Lister from "./repository_lister";
export * as Logger from "./logger/logger";
export * as Sync from "./sync";

// Utilities
export * as Clock from "./utils/clock";
export * as Duration from "./utils/duration";
