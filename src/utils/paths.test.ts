import { describe, expect, it } from "vitest";
import { displayPath, expandHome } from "./paths.js";

describe("expandHome", () => {
	it("expands a leading ~/", () => {
		expect(expandHome("~/.cargo/config.toml", "/home/dev")).toBe("/home/dev/.cargo/config.toml");
	});

	it("expands a bare ~", () => {
		expect(expandHome("~", "/home/dev")).toBe("/home/dev");
	});

	it("leaves absolute paths alone", () => {
		expect(expandHome("/etc/cargo/config.toml", "/home/dev")).toBe("/etc/cargo/config.toml");
	});
});

describe("displayPath", () => {
	it("shortens paths under home", () => {
		expect(displayPath("/home/dev/.cargo/config.toml", "/home/dev")).toBe("~/.cargo/config.toml");
	});

	it("does not shorten sibling directories", () => {
		expect(displayPath("/home/developer/config.toml", "/home/dev")).toBe(
			"/home/developer/config.toml",
		);
	});
});
