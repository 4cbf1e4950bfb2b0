export * from "./entry.schema.js";
export * from "./report.schema.js";
export * from "./category.schema.js";
