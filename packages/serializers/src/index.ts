export * from "./bits";
export { Unicode } from "./unicode-reader";
