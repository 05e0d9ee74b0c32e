#!/usr/bin/env node
import { buildApplication, buildRouteMap, run } from "@stricli/core";
import { parseCommand } from "./commands/parse/command.js";
import { scrapeCommand } from "./commands/scrape/command.js";
import { buildContext } from "./context.js";

const routes = buildRouteMap({
	routes: {
		scrape: scrapeCommand,
		parse: parseCommand,
	},
	docs: {
		brief: "Extract structured posts from group feed pages.",
	},
});

export const app = buildApplication(routes, {
	name: "feedsift",
	versionInfo: {
		currentVersion: "0.1.0",
	},
	scanner: {
		caseStyle: "allow-kebab-for-camel",
	},
	documentation: {
		caseStyle: "convert-camel-to-kebab",
	},
});

await run(app, process.argv.slice(2), buildContext(process));
