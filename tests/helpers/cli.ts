import type { MockInstance } from "vitest";
import path from "node:path";

export type CliSpies = {
	logSpy: ReturnType<typeof vi.spyOn>;
	errorSpy: ReturnType<typeof vi.spyOn>;
	exitSpy: MockInstance<typeof process.exit>;
	cwdSpy: ReturnType<typeof vi.spyOn>;
};

/**
 * Point every configuration root at `root` and silence console output. The registry
 * lives at `<root>/registry`, the project at `<root>/project`, home at `<root>/home`.
 */
export function setupCliEnvironment(root: string): CliSpies {
	vi.stubEnv("HOME", path.join(root, "home"));
	vi.stubEnv("AGENTCFG_USER_DIR", path.join(root, "home", ".gemini"));
	vi.stubEnv("AGENTCFG_PROJECT_DIR", path.join(root, "project"));
	vi.stubEnv("AGENTCFG_REPO_DIR", path.join(root, "registry"));
	vi.stubEnv("AGENTCFG_HEALTH_TIMEOUT_MS", "");
	return {
		logSpy: vi.spyOn(console, "log").mockImplementation(() => {}),
		errorSpy: vi.spyOn(console, "error").mockImplementation(() => {}),
		exitSpy: vi.spyOn(process, "exit").mockImplementation(() => undefined as never),
		cwdSpy: vi.spyOn(process, "cwd").mockReturnValue(root),
	};
}

export function restoreCliEnvironment(spies: CliSpies): void {
	spies.logSpy.mockRestore();
	spies.errorSpy.mockRestore();
	spies.exitSpy.mockRestore();
	spies.cwdSpy.mockRestore();
	vi.unstubAllEnvs();
}

export const joinOutput = (calls: unknown[][]) => calls.map(([arg]) => String(arg)).join("\n");
