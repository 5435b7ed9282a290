export type CommandDocument = {
	description: string | null;
	prompt: string | null;
};

export const DEFAULT_PROMPT = "Write your prompt here...";

const LITERAL_MULTILINE = "'''";
const BASIC_MULTILINE = '"""';

function formatTomlString(value: string): string {
	return JSON.stringify(value);
}

function formatPrompt(prompt: string): string {
	if (prompt.includes(LITERAL_MULTILINE)) {
		return formatTomlString(prompt);
	}
	// The newline right after the opening delimiter is dropped by TOML readers.
	return `${LITERAL_MULTILINE}\n${prompt}${LITERAL_MULTILINE}`;
}

export function defaultDescription(name: string): string {
	return `Command for ${name}`;
}

/**
 * Render a slash-command definition. The store never parses this back for comparison;
 * it is only a convenience for `add` when the caller supplies a prompt.
 */
export function buildCommandDocument(options: {
	name: string;
	prompt?: string | null;
	description?: string | null;
}): string {
	const description = options.description?.trim() || defaultDescription(options.name);
	const prompt = options.prompt ?? DEFAULT_PROMPT;
	return [
		`description = ${formatTomlString(description)}`,
		`prompt = ${formatPrompt(prompt)}`,
		"",
	].join("\n");
}

const BASIC_ESCAPES: Record<string, string> = {
	b: "\b",
	t: "\t",
	n: "\n",
	f: "\f",
	r: "\r",
	'"': '"',
	"\\": "\\",
};

function unescapeBasic(value: string): string {
	return value
		.replace(/\\[ \t]*\r?\n\s*/g, "")
		.replace(/\\(u[0-9A-Fa-f]{4}|U[0-9A-Fa-f]{8}|[btnfr"\\])/g, (_match, escape: string) => {
			if (escape.startsWith("u") || escape.startsWith("U")) {
				return String.fromCodePoint(Number.parseInt(escape.slice(1), 16));
			}
			return BASIC_ESCAPES[escape] ?? escape;
		});
}

function parseSingleLine(rawValue: string): string | null {
	const trimmed = rawValue.trim();
	if (trimmed.startsWith('"')) {
		const end = trimmed.lastIndexOf('"');
		return end > 0 ? unescapeBasic(trimmed.slice(1, end)) : null;
	}
	if (trimmed.startsWith("'")) {
		const end = trimmed.lastIndexOf("'");
		return end > 0 ? trimmed.slice(1, end) : null;
	}
	return null;
}

function readMultiline(
	lines: string[],
	startIndex: number,
	firstValue: string,
	delimiter: string,
): { value: string; endIndex: number } | null {
	const opening = firstValue.trimStart().slice(delimiter.length);
	const sameLineEnd = opening.indexOf(delimiter);
	if (sameLineEnd >= 0) {
		return { value: opening.slice(0, sameLineEnd), endIndex: startIndex };
	}

	const collected: string[] = opening.length > 0 ? [opening] : [];
	for (let index = startIndex + 1; index < lines.length; index += 1) {
		const line = lines[index];
		const end = line.indexOf(delimiter);
		if (end >= 0) {
			collected.push(line.slice(0, end));
			return { value: collected.join("\n"), endIndex: index };
		}
		collected.push(line);
	}
	return null;
}

/**
 * Pull `description` and `prompt` out of a command definition. Understands the four
 * TOML string forms; anything else is ignored.
 */
export function readCommandDocument(contents: string): CommandDocument {
	const lines = contents.split(/\r?\n/);
	const values: Record<string, string> = {};

	for (let index = 0; index < lines.length; index += 1) {
		const trimmed = lines[index].trim();
		if (!trimmed || trimmed.startsWith("#")) {
			continue;
		}
		const match = trimmed.match(/^([A-Za-z0-9_-]+)\s*=\s*(.*)$/);
		if (!match) {
			continue;
		}
		const [, key, rawValue] = match;

		const delimiter = rawValue.startsWith(BASIC_MULTILINE)
			? BASIC_MULTILINE
			: rawValue.startsWith(LITERAL_MULTILINE)
				? LITERAL_MULTILINE
				: null;
		if (delimiter) {
			const multiline = readMultiline(lines, index, rawValue, delimiter);
			if (!multiline) {
				break;
			}
			values[key] =
				delimiter === BASIC_MULTILINE ? unescapeBasic(multiline.value) : multiline.value;
			index = multiline.endIndex;
			continue;
		}

		const value = parseSingleLine(rawValue);
		if (value !== null) {
			values[key] = value;
		}
	}

	return {
		description: values.description ?? null,
		prompt: values.prompt ?? null,
	};
}
