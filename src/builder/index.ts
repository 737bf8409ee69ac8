export * from "./basic-builder.js";
