import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

// =============================================================================
// Package Detection
// =============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Get the base directory for resolving package assets (package.json).
 * Walks up from this module until a package.json is found, which is the
 * package root both under tsx (src/) and after a build (dist/).
 */
export function getPackageDir(): string {
	let dir = __dirname;
	while (dir !== dirname(dir)) {
		if (existsSync(join(dir, "package.json"))) {
			return dir;
		}
		dir = dirname(dir);
	}
	// Fallback (shouldn't happen)
	return __dirname;
}

/** Get path to package.json */
export function getPackageJsonPath(): string {
	return join(getPackageDir(), "package.json");
}

// =============================================================================
// App Config (from package.json linepadConfig)
// =============================================================================

interface PackageInfo {
	name: string;
	configDir: string;
	version: string;
}

function readPackageInfo(): PackageInfo {
	const pkg: unknown = JSON.parse(readFileSync(getPackageJsonPath(), "utf-8"));
	const info: PackageInfo = { name: "linepad", configDir: ".linepad", version: "0.0.0" };
	if (typeof pkg !== "object" || pkg === null) {
		return info;
	}
	if ("version" in pkg && typeof pkg.version === "string") {
		info.version = pkg.version;
	}
	if ("linepadConfig" in pkg && typeof pkg.linepadConfig === "object" && pkg.linepadConfig !== null) {
		const config = pkg.linepadConfig;
		if ("name" in config && typeof config.name === "string") info.name = config.name;
		if ("configDir" in config && typeof config.configDir === "string") info.configDir = config.configDir;
	}
	return info;
}

const pkg = readPackageInfo();

export const APP_NAME: string = pkg.name;
export const CONFIG_DIR_NAME: string = pkg.configDir;
export const VERSION: string = pkg.version;

// e.g., LINEPAD_DIR
export const ENV_CONFIG_DIR = `${APP_NAME.toUpperCase()}_DIR`;

// =============================================================================
// User Config Paths (~/.linepad/*)
// =============================================================================

/** Expand a leading `~` to the home directory */
export function expandHome(path: string): string {
	if (path === "~") return homedir();
	if (path.startsWith("~/")) return homedir() + path.slice(1);
	return path;
}

/** Get the user config directory (e.g., ~/.linepad/) */
export function getConfigDir(): string {
	const envDir = process.env[ENV_CONFIG_DIR];
	if (envDir) {
		return expandHome(envDir);
	}
	return join(homedir(), CONFIG_DIR_NAME);
}
