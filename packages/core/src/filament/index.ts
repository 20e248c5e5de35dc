export * from "./image";
export * from "./interpret";
export * from "./recognizer";
export * from "./service";
