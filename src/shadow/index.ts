export {
	resolveShadowPaths,
	restoreStranded,
	shadowConfig,
	type RestoreStatus,
	type ShadowHandle,
	type ShadowOptions,
	type ShadowPaths,
} from "./shadow.js";
