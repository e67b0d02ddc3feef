// ESM + NodeNext: include .js in re-exports
export * from "./maps.dto.js";
