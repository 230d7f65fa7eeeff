export * from "./types/board";
export * from "./types/assignment";
export * from "./libs/Encoding";
export * from "./libs/GridCodec";
export { renderBoard, cellWidth, center } from "./libs/display";
export { GridFormatError } from "./errors";
