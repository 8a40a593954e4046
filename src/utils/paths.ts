import { homedir } from "node:os";
import { join, resolve } from "node:path";

export function expandHome(path: string, home: string = homedir()): string {
	if (path === "~") {
		return home;
	}
	if (path.startsWith("~/")) {
		return join(home, path.slice(2));
	}
	return resolve(process.cwd(), path);
}

// Shortens a path under the home directory back to ~ for display
export function displayPath(path: string, home: string = homedir()): string {
	if (path === home) {
		return "~";
	}
	if (path.startsWith(`${home}/`)) {
		return `~/${path.slice(home.length + 1)}`;
	}
	return path;
}
