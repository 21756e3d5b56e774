// packages/bql/src/index.ts
export * from "./token.js";
export * from "./lexer.js";
export * from "./ast.js";
export * from "./errors.js";
export * from "./parser.js";
export * from "./fields.js";
export * from "./validator.js";
export * from "./sql-builder.js";
export * from "./highlight.js";
export * from "./query-text.js";
