import { InvalidArgumentError } from "../lib/errors.js";
import { isScope, SCOPES, type Scope } from "../lib/scopes.js";
import {
	COMMAND_LOCATIONS,
	type CommandLocation,
	isCommandLocation,
} from "../lib/slash-commands/catalog.js";

export const scopeOption = {
	type: "string",
	choices: [...SCOPES],
	describe: "Scope to act on (default: project inside a repository, else user)",
} as const;

export function parseScopeOption(value?: string): Scope | undefined {
	if (value === undefined) {
		return undefined;
	}
	if (!isScope(value)) {
		throw new InvalidArgumentError(`Invalid scope "${value}". Use ${SCOPES.join(" or ")}.`);
	}
	return value;
}

export function parseLocationOption(value?: string): CommandLocation | undefined {
	if (value === undefined) {
		return undefined;
	}
	if (!isCommandLocation(value)) {
		throw new InvalidArgumentError(
			`Invalid location "${value}". Use ${COMMAND_LOCATIONS.join(", ")}.`,
		);
	}
	return value;
}

export function parseLocationList(value?: string | string[]): CommandLocation[] {
	const raw = value === undefined ? [] : Array.isArray(value) ? value : [value];
	const locations: CommandLocation[] = [];
	const entries = raw
		.flatMap((item) => item.split(","))
		.map((item) => item.trim().toLowerCase())
		.filter(Boolean);
	for (const entry of entries) {
		const location = parseLocationOption(entry);
		if (location && !locations.includes(location)) {
			locations.push(location);
		}
	}
	return locations;
}

export function parseTimeoutOption(value?: number): number | undefined {
	if (value === undefined) {
		return undefined;
	}
	if (!Number.isInteger(value) || value <= 0) {
		throw new InvalidArgumentError("Invalid value for --timeout: must be a positive integer.");
	}
	return value;
}
