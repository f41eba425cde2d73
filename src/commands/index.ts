export {
	type ConfigInitOptions,
	configInit,
	configShow,
} from "./config/index";
export { type ResolveOptions, resolve } from "./resolve";
export { type ShowOptions, show } from "./show";
