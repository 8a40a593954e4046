import { homedir } from "node:os";
import { join } from "node:path";
import { BaseToolAdapter } from "./adapter.js";

export class CrossAdapter extends BaseToolAdapter {
	name = "cross";

	protected getCommonPaths(): string[] {
		// Only the stock `cross` binary has a known install location
		if (this.getCommandName() !== "cross") {
			return [];
		}
		const home = homedir();
		return [
			join(home, ".cargo", "bin", "cross"), // cargo install cross
			"/usr/local/bin/cross",
		];
	}
}
