/**
 * huectl - render one declarative color theme into many application configs
 */

// Errors
export * from "./errors.js";

// Colors and theme model
export * from "./color/index.js";
export * from "./theme/index.js";

// Structural and accessibility validation
export * from "./validator/index.js";

// Per-application renderers
export * from "./generators/index.js";

// User settings
export * from "./config/index.js";

// Writing configs, backups
export * from "./deploy/index.js";
