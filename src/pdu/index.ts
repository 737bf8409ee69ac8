export * from "./tlv-container.js";
export * from "./pdus.js";
