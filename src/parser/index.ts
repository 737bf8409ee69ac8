export * from "./basic-parser.js";
