/**
 * Registry: config - centralized configuration access
 *
 * Provides a centralized location for accessing the server configuration.
 * The CONFIG object is loaded and updated by the config package.
 *
 * @module registry/config
 */

import type { DeepReadonly } from "../utils/types.js";

export { READONLY_CONFIG as CONFIG };

export type GameConfig = {
	name: string;
	starting_room: string;
};

export type ServerConfig = {
	host: string;
	port: number;
	max_connections_per_ip: number;
	/** Minutes of inactivity before a session is closed. */
	session_timeout: number;
	/** Seconds between maintenance ticks. */
	tick_interval: number;
	/** Seconds a single line read may wait. */
	read_timeout: number;
	/** Commands accepted per connection per second. */
	command_rate_limit: number;
};

export type SecurityConfig = {
	password_salt: string;
};

export type Config = {
	game: GameConfig;
	server: ServerConfig;
	security: SecurityConfig;
};

export const CONFIG_DEFAULT: DeepReadonly<Config> = {
	game: {
		name: "Ember MUD",
		starting_room: "square",
	},
	server: {
		host: "0.0.0.0",
		port: 4000,
		max_connections_per_ip: 5,
		session_timeout: 60,
		tick_interval: 30,
		read_timeout: 300,
		command_rate_limit: 10,
	},
	security: {
		password_salt: "changeme_default_salt",
	},
};

// make a copy of the default, don't reference it directly plz
const CONFIG: Config = {
	game: { ...CONFIG_DEFAULT.game },
	server: { ...CONFIG_DEFAULT.server },
	security: { ...CONFIG_DEFAULT.security },
};

// export a readonly version of the config
const READONLY_CONFIG: DeepReadonly<Config> = CONFIG;

/**
 * Set the config object.
 * @param config - The config object to set.
 */
export function setConfig(config: Config) {
	CONFIG.game = { ...config.game };
	CONFIG.server = { ...config.server };
	CONFIG.security = { ...config.security };
}

/**
 * Put every value back to its default.
 */
export function resetConfig() {
	setConfig({
		game: { ...CONFIG_DEFAULT.game },
		server: { ...CONFIG_DEFAULT.server },
		security: { ...CONFIG_DEFAULT.security },
	});
}
