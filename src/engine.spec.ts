import { suite, test, afterEach } from "node:test";
import assert from "node:assert";
import type { Command } from "./core/command.js";
import { SESSION_STATE } from "./core/session.js";
import { Engine, MESSAGE, PROMPT } from "./engine.js";
import { YamlStore } from "./package/accounts.js";
import {
	FakeTransport,
	buildTestWorld,
	connect,
	createTestEngine,
	flush,
	joinAs,
	waitFor,
} from "./utils/testing.js";

const ping: Command = {
	name: "ping",
	usage: "ping",
	description: "Answer with pong.",
	execute: ({ connection }) => connection.sendLine("pong"),
};

const boom: Command = {
	name: "boom",
	usage: "boom",
	description: "Always fails.",
	execute: () => {
		throw new Error("kaboom");
	},
};

suite("engine.ts", () => {
	let engine: Engine | undefined;

	afterEach(async () => {
		await engine?.stop();
		engine = undefined;
	});

	suite("processCommand()", () => {
		test("should answer an unknown verb with exactly one line", async () => {
			engine = await createTestEngine();
			const client = connect(engine);
			await engine.processCommand(client.session, "xyzzy");
			assert.strictEqual(
				client.transport.bytes().toString("utf8"),
				"Unknown command: xyzzy. Type 'help' for a list of commands.\r\n"
			);
		});

		test("should match verbs in any case", async () => {
			engine = await createTestEngine({ commands: [ping] });
			const client = connect(engine);
			await engine.processCommand(client.session, "  PING  ");
			await engine.processCommand(client.session, "XYZZY");
			assert.deepStrictEqual(client.transport.lines(), [
				"pong",
				"Unknown command: xyzzy. Type 'help' for a list of commands.",
			]);
		});

		test("should ignore blank lines", async () => {
			engine = await createTestEngine();
			const client = connect(engine);
			await engine.processCommand(client.session, "   ");
			assert.strictEqual(client.transport.bytes().length, 0);
		});

		test("should require a character for in-world commands", async () => {
			engine = await createTestEngine();
			const client = connect(engine);
			await engine.processCommand(client.session, "say hello");
			assert.deepStrictEqual(client.transport.lines(), [MESSAGE.NEEDS_CHARACTER]);
		});

		test("should show usage when arguments are missing", async () => {
			engine = await createTestEngine();
			const ada = await joinAs(engine, "Ada");
			await engine.processCommand(ada.session, "say");
			assert.deepStrictEqual(ada.transport.lines(), ["Usage: say <message>"]);
		});

		test("should contain a failing handler to its own session", async () => {
			engine = await createTestEngine({ commands: [boom, ping] });
			const first = connect(engine);
			const second = connect(engine);
			await engine.processCommand(first.session, "boom");
			await engine.processCommand(second.session, "ping");
			await engine.processCommand(first.session, "ping");
			assert.deepStrictEqual(first.transport.lines(), [
				MESSAGE.COMMAND_FAILED,
				"pong",
			]);
			assert.deepStrictEqual(second.transport.lines(), ["pong"]);
			assert.strictEqual(first.connection.isClosed(), false);
		});

		test("should rate limit a flood of commands", async () => {
			engine = await createTestEngine({ commands: [ping], commandRateLimit: 2 });
			const client = connect(engine);
			await engine.processCommand(client.session, "ping");
			await engine.processCommand(client.session, "ping");
			await engine.processCommand(client.session, "ping");
			assert.deepStrictEqual(client.transport.lines(), [
				"pong",
				"pong",
				MESSAGE.SLOW_DOWN,
			]);
		});

		test("should rate limit each session on its own", async () => {
			engine = await createTestEngine({ commands: [ping], commandRateLimit: 1 });
			const first = connect(engine);
			const second = connect(engine);
			await engine.processCommand(first.session, "ping");
			await engine.processCommand(second.session, "ping");
			assert.deepStrictEqual(first.transport.lines(), ["pong"]);
			assert.deepStrictEqual(second.transport.lines(), ["pong"]);
		});

		test("should expand the say and emote shortcuts", async () => {
			engine = await createTestEngine();
			const ada = await joinAs(engine, "Ada");
			const bob = await joinAs(engine, "Bob");
			await engine.processCommand(ada.session, "'hello there");
			await engine.processCommand(ada.session, ":waves.");
			assert.deepStrictEqual(ada.transport.lines(), [
				'You say, "hello there"',
				"Ada waves.",
			]);
			assert.deepStrictEqual(bob.transport.lines(), [
				'Ada says, "hello there"',
				"Ada waves.",
			]);
		});

		test("should pass arguments and the raw remainder", async () => {
			const seen: string[][] = [];
			const echo: Command = {
				name: "echo",
				usage: "echo <words>",
				description: "Record arguments.",
				execute: ({ args, argText, rawInput }) => {
					seen.push([...args], [argText, rawInput]);
				},
			};
			engine = await createTestEngine({ commands: [echo] });
			const client = connect(engine);
			await engine.processCommand(client.session, " Echo  one   Two ");
			assert.deepStrictEqual(seen, [
				["one", "Two"],
				["one   Two", "Echo  one   Two"],
			]);
		});

		test("should hand a failed read back to the caller", async () => {
			engine = await createTestEngine();
			const client = connect(engine);
			const login = engine.processCommand(client.session, "login ada");
			await flush();
			client.transport.type("\x03");
			await assert.rejects(login, { name: "ConnectionError", reason: "interrupted" });
			assert.deepStrictEqual(client.transport.lines(), ["Password: "]);
			assert.strictEqual(client.connection.isClosed(), true);
		});
	});

	suite("broadcasts", () => {
		test("should reach everyone in the room except the sender", async () => {
			engine = await createTestEngine();
			const ada = await joinAs(engine, "Ada");
			const bob = await joinAs(engine, "Bob");
			const cyd = await joinAs(engine, "Cyd");
			const eve = await joinAs(engine, "Eve", "gate");
			assert.strictEqual(engine.broadcastToRoom("square", "Hello", ada.session.id), 2);
			await flush();
			assert.deepStrictEqual(ada.transport.lines(), []);
			assert.deepStrictEqual(bob.transport.lines(), ["Hello"]);
			assert.deepStrictEqual(cyd.transport.lines(), ["Hello"]);
			assert.deepStrictEqual(eve.transport.lines(), []);
		});

		test("should reach every playing session", async () => {
			engine = await createTestEngine();
			const ada = await joinAs(engine, "Ada");
			const bob = await joinAs(engine, "Bob", "gate");
			const lobby = connect(engine);
			assert.strictEqual(engine.broadcastAll("News", ada.session.id), 1);
			assert.strictEqual(engine.broadcastAll("All"), 2);
			await flush();
			assert.deepStrictEqual(bob.transport.lines(), ["News", "All"]);
			assert.deepStrictEqual(ada.transport.lines(), ["All"]);
			assert.deepStrictEqual(lobby.transport.lines(), []);
		});

		test("should send to one character", async () => {
			engine = await createTestEngine();
			const ada = await joinAs(engine, "Ada");
			assert.strictEqual(engine.sendToCharacter(ada.character.id, "Psst"), true);
			assert.strictEqual(engine.sendToCharacter("nobody", "Psst"), false);
			await flush();
			assert.deepStrictEqual(ada.transport.lines(), ["Psst"]);
		});

		test("should return zero for an unknown room", async () => {
			engine = await createTestEngine();
			assert.strictEqual(engine.broadcastToRoom("nowhere", "Hello"), 0);
		});
	});

	suite("world binding", () => {
		test("should put a character in its saved room", async () => {
			engine = await createTestEngine();
			const ada = await joinAs(engine, "Ada", "bakery");
			assert.strictEqual(ada.session.state, SESSION_STATE.PLAYING);
			assert.strictEqual(ada.session.characterId, ada.character.id);
			assert.strictEqual(engine.world.locate(ada.character.id), "bakery");
			assert.strictEqual(engine.getRoomFor(ada.session)?.id, "bakery");
			assert.strictEqual(engine.findPlayingSession("ADA"), ada.session);
		});

		test("should fall back to the starting room", async () => {
			engine = await createTestEngine();
			const ada = await joinAs(engine, "Ada", "demolished");
			assert.strictEqual(engine.world.locate(ada.character.id), "square");
		});

		test("should refuse a character played by another session", async () => {
			engine = await createTestEngine();
			const ada = await joinAs(engine, "Ada");
			const other = connect(engine);
			assert.strictEqual(engine.enterWorld(other.session, ada.character), undefined);
			assert.strictEqual(other.session.characterId, undefined);
			assert.strictEqual(engine.getPlayingSessions().length, 1);
		});

		test("should refuse a session that has not logged in", async () => {
			engine = await createTestEngine();
			const ada = await joinAs(engine, "Ada");
			await engine.leaveWorld(ada.session);
			const stranger = connect(engine);
			assert.strictEqual(engine.enterWorld(stranger.session, ada.character), undefined);
			assert.strictEqual(stranger.session.state, SESSION_STATE.CONNECTED);
			assert.strictEqual(stranger.session.characterId, undefined);
			assert.strictEqual(engine.world.locate(ada.character.id), undefined);
		});

		test("should save the room on leaving", async () => {
			engine = await createTestEngine();
			const ada = await joinAs(engine, "Ada");
			assert.strictEqual(engine.moveCharacter(ada.session, "gate"), true);
			await engine.leaveWorld(ada.session);
			assert.strictEqual(engine.world.locate(ada.character.id), undefined);
			assert.strictEqual(engine.findPlayingSession("Ada"), undefined);
			const saved = await engine.store.getCharacter(ada.character.id);
			assert.strictEqual(saved?.roomId, "gate");
			assert.ok(saved?.lastPlayedAt);
		});

		test("should tell the room when a player disconnects", async () => {
			engine = await createTestEngine();
			const ada = await joinAs(engine, "Ada");
			const bob = await joinAs(engine, "Bob");
			await engine.disconnect(ada.session);
			assert.deepStrictEqual(bob.transport.lines(), ["Ada has left the game."]);
			assert.strictEqual(engine.sessions.getSession(ada.session.id), undefined);
			assert.strictEqual(ada.session.state, SESSION_STATE.DISCONNECTED);
			assert.strictEqual(ada.connection.isClosed(), true);
			assert.deepStrictEqual(engine.world.getRoom("square")?.getOccupants(), [
				bob.character.id,
			]);
		});
	});

	suite("ticks", () => {
		test("should disconnect idle sessions", async () => {
			engine = await createTestEngine({ sessionTimeoutMinutes: 60 });
			const ada = await joinAs(engine, "Ada");
			const bob = await joinAs(engine, "Bob");
			engine.moveCharacter(ada.session, "bakery");
			engine.moveCharacter(bob.session, "bakery");
			ada.session.touch(new Date(Date.now() - 61 * 60 * 1000));
			assert.strictEqual(await engine.ticks.tick(), true);
			assert.deepStrictEqual(ada.transport.lines(), [MESSAGE.IDLE]);
			assert.deepStrictEqual(bob.transport.lines(), ["Ada has left the game."]);
			assert.strictEqual(engine.sessions.getSession(ada.session.id), undefined);
			assert.strictEqual(engine.sessions.getSession(bob.session.id), bob.session);
			assert.strictEqual(
				(await engine.store.getCharacter(ada.character.id))?.roomId,
				"bakery"
			);
		});

		test("should save where characters are", async () => {
			engine = await createTestEngine();
			const ada = await joinAs(engine, "Ada");
			engine.moveCharacter(ada.session, "gate");
			await engine.ticks.tick();
			assert.strictEqual(
				(await engine.store.getCharacter(ada.character.id))?.roomId,
				"gate"
			);
			assert.strictEqual(engine.getPlayingSessions().length, 1);
		});

		test("should keep ticking when an idle client has stopped reading", async () => {
			engine = await createTestEngine({ sessionTimeoutMinutes: 60, noticeTimeoutMs: 20 });
			const ada = await joinAs(engine, "Ada");
			ada.transport.stallWrites = true;
			ada.session.touch(new Date(Date.now() - 61 * 60 * 1000));
			assert.strictEqual(await engine.ticks.tick(), true);
			assert.deepStrictEqual(ada.transport.lines(), [MESSAGE.IDLE]);
			assert.strictEqual(ada.connection.isClosed(), true);
			assert.strictEqual(engine.sessions.getSession(ada.session.id), undefined);
			assert.strictEqual(await engine.ticks.tick(), true);
		});

		test("should run extra tick callbacks", async () => {
			engine = await createTestEngine();
			let runs = 0;
			engine.registerTickCallback("count", () => {
				runs++;
			});
			await engine.ticks.tick();
			assert.strictEqual(runs, 1);
		});
	});

	suite("lifecycle", () => {
		test("should load rooms from a directory when no world is given", async () => {
			engine = new Engine({
				store: new YamlStore(),
				commands: [ping],
				listen: false,
				tickIntervalMs: 60_000,
			});
			await engine.start();
			assert.strictEqual(engine.world.size, 7);
			assert.strictEqual(engine.commands.size, 1);
			assert.strictEqual(engine.isRunning(), true);
		});

		test("should give up when the rooms cannot be loaded", async () => {
			const broken = new Engine({
				store: new YamlStore(),
				roomsDirectory: "/nonexistent/rooms",
				commands: [ping],
				listen: false,
			});
			await assert.rejects(broken.start(), { name: "WorldLoadError" });
			assert.strictEqual(broken.isRunning(), false);
			assert.strictEqual(broken.ticks.isStarted(), false);
		});

		test("should greet with the game name and the first commands", async () => {
			engine = await createTestEngine();
			assert.deepStrictEqual(engine.banner().split("\n").slice(0, 4), [
				"{CTest MUD{x",
				"",
				"To get started:",
				"  {Yregister <name> <password>{x - create a new account",
			]);
		});

		test("should pick the prompt from the session's identity", async () => {
			engine = await createTestEngine();
			const client = connect(engine);
			assert.strictEqual(engine.promptFor(client.session), PROMPT.LOGIN);
			client.session.setUser("user-1");
			assert.strictEqual(engine.promptFor(client.session), PROMPT.CHARACTER_SELECT);
			const ada = await joinAs(engine, "Ada");
			assert.strictEqual(engine.promptFor(ada.session), PROMPT.PLAYING);
		});

		test("should play a whole visit over one connection", async () => {
			engine = await createTestEngine({ world: buildTestWorld() });
			const transport = new FakeTransport("10.1.1.1");
			const connection = engine.server.accept(transport);
			assert.ok(connection);
			await waitFor(() => transport.text().endsWith(PROMPT.LOGIN));
			assert.deepStrictEqual([...transport.bytes().subarray(0, 6)], [
				255, 251, 1, 255, 251, 3,
			]);
			assert.deepStrictEqual(transport.lines().slice(0, 2), ["Test MUD", ""]);

			transport.type("register ada test-secret\r\n");
			await waitFor(() => transport.text().endsWith(PROMPT.CHARACTER_SELECT));
			transport.type("create aria\r\n");
			await waitFor(() => transport.text().includes("Character Aria created."));
			transport.type("play aria\r\n");
			await waitFor(() => transport.text().endsWith(`[Exits: north, east]\r\n${PROMPT.PLAYING}`));
			transport.clear();

			transport.type("north\r\n");
			await waitFor(() => transport.text().endsWith(PROMPT.PLAYING));
			assert.deepStrictEqual(transport.lines(), [
				"north",
				"Town Gate",
				"A heavy gate.",
				"[Exits: south]",
				PROMPT.PLAYING,
			]);

			transport.type("quit\r\n");
			await waitFor(() => transport.destroyed);
			await waitFor(() => engine?.sessions.size === 0);
			const aria = await engine.store.findCharacterByName("Aria");
			assert.strictEqual(aria?.roomId, "gate");
			assert.strictEqual(engine.server.getConnectionCount(), 0);
		});

		test("should say goodbye to connected players on stop", async () => {
			const running = await createTestEngine();
			const transport = new FakeTransport();
			running.server.accept(transport);
			await waitFor(() => transport.text().endsWith(PROMPT.LOGIN));
			await running.stop();
			assert.ok(transport.text().includes(`${MESSAGE.SHUTDOWN}\r\n`));
			assert.strictEqual(transport.destroyed, true);
		});

		test("should stop even when a client has stopped reading", async () => {
			const running = await createTestEngine({ noticeTimeoutMs: 20 });
			const transport = new FakeTransport();
			transport.stallWrites = true;
			running.server.accept(transport);
			await running.stop();
			assert.deepStrictEqual(transport.lines(), [MESSAGE.SHUTDOWN]);
			assert.strictEqual(transport.destroyed, true);
			assert.strictEqual(running.server.getConnectionCount(), 0);
		});
	});
});
