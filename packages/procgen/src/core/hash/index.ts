export * from "./checksum";
