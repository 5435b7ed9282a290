import { InvalidArgumentError } from "./errors.js";

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\/]/g;

function escapeRegex(value: string): string {
	return value.replace(REGEX_SPECIALS, "\\$&");
}

/**
 * Shell-style wildcard to an anchored, case-sensitive RegExp. `*` and `?` cross
 * namespace separators; `[abc]`, `[a-z]`, and `[!abc]` match one character. An
 * unterminated `[` is taken literally. A malformed class such as `[z-a]` raises
 * InvalidArgumentError.
 */
export function globToRegExp(pattern: string): RegExp {
	let source = "";
	let index = 0;

	while (index < pattern.length) {
		const char = pattern[index];
		if (char === "*") {
			source += ".*";
			index += 1;
			continue;
		}
		if (char === "?") {
			source += ".";
			index += 1;
			continue;
		}
		if (char === "[") {
			const bodyStart = pattern[index + 1] === "!" ? index + 2 : index + 1;
			const close = pattern.indexOf("]", bodyStart + 1);
			if (close === -1) {
				source += "\\[";
				index += 1;
				continue;
			}
			let body = pattern.slice(index + 1, close);
			const negated = body.startsWith("!");
			if (negated) {
				body = body.slice(1);
			}
			const escaped = body.replace(/[\\\]^]/g, "\\$&");
			source += negated ? `[^${escaped}]` : `[${escaped}]`;
			index = close + 1;
			continue;
		}
		source += escapeRegex(char);
		index += 1;
	}

	try {
		return new RegExp(`^${source}$`);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new InvalidArgumentError(`Invalid name pattern "${pattern}": ${reason}`);
	}
}

export function matchesNamePattern(name: string, pattern?: string | null): boolean {
	if (!pattern) {
		return true;
	}
	return globToRegExp(pattern).test(name);
}

export function filterByNamePattern<T>(
	items: T[],
	pattern: string | null | undefined,
	nameOf: (item: T) => string,
): T[] {
	if (!pattern) {
		return items;
	}
	const matcher = globToRegExp(pattern);
	return items.filter((item) => matcher.test(nameOf(item)));
}
