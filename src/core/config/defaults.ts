// PURITY: CORE
// INVARIANT: mergeConfig returns a new object; DEFAULT_CONFIG is never mutated
// COMPLEXITY: O(1)

import type { AnalyzerConfig } from "../types/index.js";

/**
 * Name of the optional configuration file looked up in the project root.
 */
export const DEFAULT_CONFIG_FILE = "include-deps.config.json";

/**
 * Layout of a kernel/hypervisor tree: one directory per subsystem, public
 * headers under `include/`, guest payloads under `guest/`.
 */
export const DEFAULT_CONFIG: AnalyzerConfig = {
	sourceRoots: [
		".",
		"boot",
		"exception",
		"io",
		"mem",
		"timer",
		"task",
		"process",
		"spinlock",
		"vmm",
		"lib",
		"fs",
		"syscall",
		"guest",
	],
	includeDirectories: ["include", "guest"],
	excludedDirectories: ["clib"],
	systemIncludePrefixes: ["sys/", "linux/", "asm/"],
	applicationDirectories: ["app"],
	applicationExcludedFiles: ["syscall.S"],
	guestPayloadDirectories: ["guest"],
	guestPayloadAllowedFiles: [
		"test_guest.S",
		"guest_manifests.c",
		"guest_manifest.h",
	],
	guestPayloadAllowedSubdirectories: [],
};

/**
 * Overlay a partial configuration on top of a base one.
 *
 * @pure true
 * @postcondition ∀k: result[k] = overrides[k] ?? base[k]
 * @complexity O(k) where k = number of keys
 */
export function mergeConfig(
	base: AnalyzerConfig,
	overrides: Partial<AnalyzerConfig>,
): AnalyzerConfig {
	return {
		sourceRoots: overrides.sourceRoots ?? base.sourceRoots,
		includeDirectories: overrides.includeDirectories ?? base.includeDirectories,
		excludedDirectories:
			overrides.excludedDirectories ?? base.excludedDirectories,
		systemIncludePrefixes:
			overrides.systemIncludePrefixes ?? base.systemIncludePrefixes,
		applicationDirectories:
			overrides.applicationDirectories ?? base.applicationDirectories,
		applicationExcludedFiles:
			overrides.applicationExcludedFiles ?? base.applicationExcludedFiles,
		guestPayloadDirectories:
			overrides.guestPayloadDirectories ?? base.guestPayloadDirectories,
		guestPayloadAllowedFiles:
			overrides.guestPayloadAllowedFiles ?? base.guestPayloadAllowedFiles,
		guestPayloadAllowedSubdirectories:
			overrides.guestPayloadAllowedSubdirectories ??
			base.guestPayloadAllowedSubdirectories,
	};
}
