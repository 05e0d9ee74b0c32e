import type { CommandContext } from "@stricli/core";

// Commands only read flags and the filesystem; Node's `process` is all the context they need.
export type LocalContext = CommandContext;

export function buildContext(nodeProcess: NodeJS.Process): LocalContext {
	return { process: nodeProcess };
}
