export { type ConfigInitOptions, configInit } from "./init";
export { configShow } from "./show";
