import type { ToolConfig } from "../config/schema.js";
import type { ToolAdapter } from "./adapter.js";
import { CrossAdapter } from "./cross.js";

export type { ExecuteOptions, ExecutionResult, ToolAdapter } from "./adapter.js";

export function getAdapter(config: ToolConfig): ToolAdapter {
	return new CrossAdapter(config);
}
