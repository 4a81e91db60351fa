/**
 * Package: config - YAML configuration loader
 *
 * Loads `data/config.yaml` (creating it with defaults if missing) and
 * merges it into the in-memory `CONFIG` object from the config registry.
 *
 * Behavior
 * - Reads YAML from `data/config.yaml`
 * - Merges only known keys from file into `CONFIG` (unknown keys ignored)
 * - A value of the wrong type is ignored and the default kept
 * - If the file is absent, writes `CONFIG_DEFAULT` to disk
 * - A file that is not valid YAML aborts the load
 *
 * @example
 * import configPkg from './package/config.js';
 * import { CONFIG } from '../registry/config.js';
 * await configPkg.loader();
 * console.log(CONFIG.server.port);
 *
 * @module package/config
 */
import { dirname, join, relative } from "path";
import { mkdir, readFile, rename, unlink, writeFile } from "fs/promises";
import YAML from "js-yaml";
import logger, { describeError } from "../utils/logger.js";
import { getSafeRootDirectory } from "../utils/path.js";
import type { Package } from "../core/package.js";
import {
	CONFIG_DEFAULT,
	type Config,
	setConfig,
} from "../registry/config.js";

const ROOT_DIRECTORY = getSafeRootDirectory();
export const CONFIG_PATH = join(ROOT_DIRECTORY, "data", "config.yaml");

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readSection(
	config: Section,
	name: string,
	knownKeys: readonly string[]
): Section {
	const section = config[name];
	if (section === undefined) return {};
	if (!isSection(section)) {
		logger.warn(`Config section ${name} is not a mapping; using defaults`);
		return {};
	}
	for (const key of Object.keys(section)) {
		if (!knownKeys.includes(key))
			logger.warn(`Unknown config key ${name}.${key} ignored`);
	}
	return section;
}

function readString(
	section: Section,
	path: string,
	key: string,
	fallback: string
): string {
	const value = section[key];
	if (value === undefined) return fallback;
	if (typeof value !== "string") {
		logger.warn(`Config ${path}.${key} must be a string; using ${fallback}`);
		return fallback;
	}
	if (value !== fallback) logger.debug(`Set ${path}.${key} = ${value}`);
	return value;
}

function readNumber(
	section: Section,
	path: string,
	key: string,
	fallback: number
): number {
	const value = section[key];
	if (value === undefined) return fallback;
	if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
		logger.warn(
			`Config ${path}.${key} must be a non-negative number; using ${fallback}`
		);
		return fallback;
	}
	if (value !== fallback) logger.debug(`Set ${path}.${key} = ${value}`);
	return value;
}

/**
 * Merge a parsed config document over the defaults.
 */
export function mergeConfig(parsed: unknown): Config {
	const config = isSection(parsed) ? parsed : {};
	const defaults = CONFIG_DEFAULT;
	const game = readSection(config, "game", Object.keys(defaults.game));
	const server = readSection(config, "server", Object.keys(defaults.server));
	const security = readSection(
		config,
		"security",
		Object.keys(defaults.security)
	);

	return {
		game: {
			name: readString(game, "game", "name", defaults.game.name),
			starting_room: readString(
				game,
				"game",
				"starting_room",
				defaults.game.starting_room
			),
		},
		server: {
			host: readString(server, "server", "host", defaults.server.host),
			port: readNumber(server, "server", "port", defaults.server.port),
			max_connections_per_ip: readNumber(
				server,
				"server",
				"max_connections_per_ip",
				defaults.server.max_connections_per_ip
			),
			session_timeout: readNumber(
				server,
				"server",
				"session_timeout",
				defaults.server.session_timeout
			),
			tick_interval: readNumber(
				server,
				"server",
				"tick_interval",
				defaults.server.tick_interval
			),
			read_timeout: readNumber(
				server,
				"server",
				"read_timeout",
				defaults.server.read_timeout
			),
			command_rate_limit: readNumber(
				server,
				"server",
				"command_rate_limit",
				defaults.server.command_rate_limit
			),
		},
		security: {
			password_salt: readString(
				security,
				"security",
				"password_salt",
				defaults.security.password_salt
			),
		},
	};
}

async function writeDefaultConfig(path: string): Promise<void> {
	const defaultContent = YAML.dump(CONFIG_DEFAULT, {
		noRefs: true,
		lineWidth: 120,
	});
	const tempPath = `${path}.tmp`;
	await mkdir(dirname(path), { recursive: true });
	try {
		// Write to temporary file first
		await writeFile(tempPath, defaultContent, "utf-8");
		// Atomically rename temp file to final location
		await rename(tempPath, path);
		logger.debug("Default config file created");
	} catch (writeError) {
		await unlink(tempPath).catch((cleanupError: unknown) =>
			logger.debug(`Could not remove ${tempPath}`, {
				error: describeError(cleanupError),
			})
		);
		throw writeError;
	}
}

export async function loadConfig(path: string = CONFIG_PATH): Promise<void> {
	logger.debug(`Loading config from ${relative(ROOT_DIRECTORY, path)}`);
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error) {
		if (isSection(error) && error.code === "ENOENT") {
			logger.info(`Config file not found, creating default at ${path}`);
			await writeDefaultConfig(path);
			setConfig(mergeConfig({}));
			return;
		}
		throw error;
	}
	setConfig(mergeConfig(YAML.load(content)));
	logger.info("Config loaded successfully");
}

export default {
	name: "config",
	loader: async () => {
		// read config.yaml
		await loadConfig();
	},
} satisfies Package;
