import { describe, expect, it } from "vitest";
import { deriveUserId, isSiteUrl, normalizeUrl } from "./url.js";

describe("normalizeUrl", () => {
	it("keeps absolute URLs unchanged", () => {
		expect(normalizeUrl("https://example.com/a?b=1")).toBe(
			"https://example.com/a?b=1",
		);
		expect(normalizeUrl("http://example.com")).toBe("http://example.com");
	});

	it("prefixes root-relative paths with the site origin", () => {
		expect(normalizeUrl("/groups/123/posts/456")).toBe(
			"https://www.facebook.com/groups/123/posts/456",
		);
	});

	it("joins other relative fragments after stripping leading dots and slashes", () => {
		expect(normalizeUrl("./profile.php?id=42")).toBe(
			"https://www.facebook.com/profile.php?id=42",
		);
		expect(normalizeUrl("../john.doe")).toBe("https://www.facebook.com/john.doe");
		expect(normalizeUrl("jane")).toBe("https://www.facebook.com/jane");
	});

	it("gives protocol-relative URLs https", () => {
		expect(normalizeUrl("//cdn.example.com/img.jpg")).toBe(
			"https://cdn.example.com/img.jpg",
		);
	});

	it("resolves against a custom origin", () => {
		expect(normalizeUrl("/x", "https://m.example.org")).toBe(
			"https://m.example.org/x",
		);
	});
});

describe("isSiteUrl", () => {
	it("matches the origin host with or without www", () => {
		expect(isSiteUrl("https://www.facebook.com/groups/1")).toBe(true);
		expect(isSiteUrl("https://facebook.com/jane")).toBe(true);
	});

	it("matches subdomains of the origin host", () => {
		expect(isSiteUrl("https://m.facebook.com/groups/1")).toBe(true);
		expect(isSiteUrl("https://web.facebook.com/jane")).toBe(true);
	});

	it("rejects other hosts and unparseable input", () => {
		expect(isSiteUrl("https://notfacebook.com/")).toBe(false);
		expect(isSiteUrl("https://facebook.com.example.org/")).toBe(false);
		expect(isSiteUrl("https://example.com/")).toBe(false);
		expect(isSiteUrl("not a url")).toBe(false);
	});
});

describe("deriveUserId", () => {
	it("prefers the numeric id query parameter", () => {
		expect(
			deriveUserId("https://www.facebook.com/profile.php?id=100012345&ref=feed"),
		).toBe("100012345");
	});

	it("falls back to the last path segment", () => {
		expect(deriveUserId("https://www.facebook.com/john.doe/")).toBe("john.doe");
		expect(
			deriveUserId("https://www.facebook.com/groups/123/user/987?__cft__=x"),
		).toBe("987");
	});

	it("derives ids from mobile profile links", () => {
		expect(deriveUserId("https://m.facebook.com/jane.doe")).toBe("jane.doe");
	});

	it("returns an empty id for off-site or empty URLs", () => {
		expect(deriveUserId("https://example.com/john")).toBe("");
		expect(deriveUserId("")).toBe("");
		expect(deriveUserId("https://www.facebook.com/")).toBe("");
	});
});
