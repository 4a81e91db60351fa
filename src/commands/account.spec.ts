import { suite, test, afterEach } from "node:test";
import assert from "node:assert";
import { SESSION_STATE } from "../core/session.js";
import type { Engine } from "../engine.js";
import { PROMPT } from "../engine.js";
import { pad } from "../utils/string.js";
import {
	TEST_PASSWORD,
	connect,
	createTestEngine,
	flush,
	joinAs,
	type TestClient,
} from "../utils/testing.js";

suite("account commands", () => {
	let engine: Engine | undefined;

	afterEach(async () => {
		await engine?.stop();
		engine = undefined;
	});

	async function run(client: TestClient, line: string): Promise<string[]> {
		if (!engine) throw new Error("engine not started");
		client.transport.clear();
		await engine.processCommand(client.session, line);
		return client.transport.lines();
	}

	suite("register", () => {
		test("should create an account and log in", async () => {
			engine = await createTestEngine();
			const client = connect(engine);
			assert.deepStrictEqual(await run(client, `register ada ${TEST_PASSWORD}`), [
				"Account Ada created. You are now logged in.",
				"Type 'create <name>' to make a character.",
			]);
			assert.strictEqual(client.session.state, SESSION_STATE.AUTHENTICATING);
			assert.ok(client.session.userId);
			assert.strictEqual(engine.promptFor(client.session), PROMPT.CHARACTER_SELECT);
			assert.strictEqual((await engine.store.findUserByName("ada"))?.name, "Ada");
		});

		test("should refuse bad names and short passwords", async () => {
			engine = await createTestEngine();
			const client = connect(engine);
			assert.deepStrictEqual(await run(client, `register 1ada ${TEST_PASSWORD}`), [
				"Names must be 3-20 letters or digits and start with a letter.",
			]);
			assert.deepStrictEqual(await run(client, "register ada short"), [
				"Passwords must be at least 6 characters.",
			]);
			assert.deepStrictEqual(await run(client, "register ada"), [
				"Usage: register <name> <password>",
			]);
			assert.strictEqual(client.session.userId, undefined);
		});

		test("should refuse a taken name", async () => {
			engine = await createTestEngine();
			await run(connect(engine), `register ada ${TEST_PASSWORD}`);
			assert.deepStrictEqual(
				await run(connect(engine), `register ADA ${TEST_PASSWORD}`),
				["That name is already taken."]
			);
		});

		test("should refuse while logged in", async () => {
			engine = await createTestEngine();
			const client = connect(engine);
			await run(client, `register ada ${TEST_PASSWORD}`);
			assert.deepStrictEqual(await run(client, `register bob ${TEST_PASSWORD}`), [
				"You are already logged in.",
			]);
		});
	});

	suite("login", () => {
		test("should accept the password on the same line", async () => {
			engine = await createTestEngine();
			const first = connect(engine);
			await run(first, `register ada ${TEST_PASSWORD}`);
			assert.deepStrictEqual(await run(first, "logout"), ["You have logged out."]);

			const client = connect(engine);
			assert.deepStrictEqual(await run(client, `login ADA ${TEST_PASSWORD}`), [
				"Welcome back, Ada!",
				"Type 'characters' to list your characters or 'create <name>' to make one.",
			]);
			const user = await engine.store.findUserByName("Ada");
			assert.strictEqual(client.session.userId, user?.id);
			assert.ok(user?.lastLoginAt);
		});

		test("should ask for a password without echoing it", async () => {
			engine = await createTestEngine();
			const ada = await joinAs(engine, "Ada");
			await engine.disconnect(ada.session);
			const client = connect(engine);
			const login = engine.processCommand(client.session, "login ada");
			await flush();
			assert.strictEqual(client.transport.text(), "Password: ");
			client.transport.type(`${TEST_PASSWORD}\r\n`);
			await login;
			assert.deepStrictEqual(client.transport.lines(), [
				"Password: ",
				"Welcome back, Ada!",
				"Type 'characters' to list your characters or 'create <name>' to make one.",
			]);
		});

		test("should not say which part was wrong", async () => {
			engine = await createTestEngine();
			const ada = await joinAs(engine, "Ada");
			await engine.disconnect(ada.session);
			const client = connect(engine);
			assert.deepStrictEqual(await run(client, "login ada wrong-password"), [
				"Invalid name or password.",
			]);
			assert.deepStrictEqual(await run(client, `login nobody ${TEST_PASSWORD}`), [
				"Invalid name or password.",
			]);
			assert.strictEqual(client.session.userId, undefined);
			assert.strictEqual(client.session.state, SESSION_STATE.AUTHENTICATING);
		});

		test("should refuse an account logged in elsewhere", async () => {
			engine = await createTestEngine();
			await joinAs(engine, "Ada");
			const client = connect(engine);
			assert.deepStrictEqual(await run(client, `login ada ${TEST_PASSWORD}`), [
				"That account is already logged in.",
			]);
		});
	});

	suite("characters and create", () => {
		test("should create characters and list them", async () => {
			engine = await createTestEngine();
			const client = connect(engine);
			await run(client, `register ada ${TEST_PASSWORD}`);
			assert.deepStrictEqual(await run(client, "characters"), [
				"You have no characters. Type 'create <name>' to make one.",
			]);
			assert.deepStrictEqual(await run(client, "create aria"), [
				"Character Aria created. Type 'play Aria' to enter the world.",
			]);
			await run(client, "create ayla");
			assert.deepStrictEqual(await run(client, "characters"), [
				"Your characters:",
				"  Aria",
				"  Ayla",
				"Type 'play <name>' to enter the world.",
			]);
			assert.strictEqual(
				(await engine.store.findCharacterByName("Aria"))?.roomId,
				"square"
			);
		});

		test("should refuse duplicate and invalid character names", async () => {
			engine = await createTestEngine();
			const client = connect(engine);
			await run(client, `register ada ${TEST_PASSWORD}`);
			await run(client, "create aria");
			assert.deepStrictEqual(await run(client, "create ARIA"), [
				"A character with that name already exists.",
			]);
			assert.deepStrictEqual(await run(client, "create a!"), [
				"Names must be 3-20 letters or digits and start with a letter.",
			]);
		});

		test("should require a login", async () => {
			engine = await createTestEngine();
			const client = connect(engine);
			assert.deepStrictEqual(await run(client, "characters"), [
				"You must log in first.",
			]);
			assert.deepStrictEqual(await run(client, "create aria"), [
				"You must log in first.",
			]);
			assert.deepStrictEqual(await run(client, "play aria"), [
				"You must log in first.",
			]);
		});
	});

	suite("delete and save", () => {
		test("should delete a character once its name is typed again", async () => {
			engine = await createTestEngine();
			const client = connect(engine);
			await run(client, `register ada ${TEST_PASSWORD}`);
			await run(client, "create aria");
			client.transport.clear();
			const deleting = engine.processCommand(client.session, "delete aria");
			await flush();
			client.transport.type("Aria\r\n");
			await deleting;
			assert.deepStrictEqual(client.transport.lines(), [
				"This will permanently delete Aria!",
				"Type 'Aria' to confirm: Aria",
				"Aria has been deleted.",
			]);
			assert.strictEqual(await engine.store.findCharacterByName("Aria"), undefined);
			assert.deepStrictEqual(await run(client, "characters"), [
				"You have no characters. Type 'create <name>' to make one.",
			]);
		});

		test("should cancel unless the name matches exactly", async () => {
			engine = await createTestEngine();
			const client = connect(engine);
			await run(client, `register ada ${TEST_PASSWORD}`);
			await run(client, "create aria");
			client.transport.clear();
			const deleting = engine.processCommand(client.session, "delete aria");
			await flush();
			client.transport.type("aria\r\n");
			await deleting;
			assert.deepStrictEqual(client.transport.lines().slice(1), [
				"Type 'Aria' to confirm: aria",
				"Deletion cancelled.",
			]);
			assert.strictEqual((await engine.store.findCharacterByName("Aria"))?.name, "Aria");
		});

		test("should only delete the account's own characters out of the game", async () => {
			engine = await createTestEngine();
			const ada = await joinAs(engine, "Ada");
			const bob = await joinAs(engine, "Bob");
			assert.deepStrictEqual(await run(ada, "delete ada"), [
				"You cannot delete a character that is in the game.",
			]);
			assert.deepStrictEqual(await run(bob, "delete ada"), [
				"You have no character named ada.",
			]);
			assert.deepStrictEqual(await run(connect(engine), "delete ada"), [
				"You must log in first.",
			]);
			assert.strictEqual((await engine.store.findCharacterByName("Ada"))?.id, ada.character.id);
		});

		test("should save where the character is", async () => {
			engine = await createTestEngine();
			const ada = await joinAs(engine, "Ada");
			engine.moveCharacter(ada.session, "gate");
			assert.deepStrictEqual(await run(ada, "save"), ["Ada has been saved."]);
			const saved = await engine.store.getCharacter(ada.character.id);
			assert.strictEqual(saved?.roomId, "gate");
			assert.ok(saved?.lastPlayedAt);
			assert.deepStrictEqual(await run(connect(engine), "save"), [
				"You must be playing a character to use that command.",
			]);
		});
	});

	suite("logout and quit", () => {
		test("should take the character out and log out", async () => {
			engine = await createTestEngine();
			const ada = await joinAs(engine, "Ada");
			const bob = await joinAs(engine, "Bob");
			engine.moveCharacter(ada.session, "gate");
			engine.moveCharacter(bob.session, "gate");
			assert.deepStrictEqual(await run(ada, "logout"), ["You have logged out."]);
			assert.deepStrictEqual(bob.transport.lines(), ["Ada has left the game."]);
			assert.strictEqual(ada.session.state, SESSION_STATE.CONNECTED);
			assert.strictEqual(ada.session.userId, undefined);
			assert.strictEqual(ada.session.characterId, undefined);
			assert.strictEqual(engine.world.locate(ada.character.id), undefined);
			assert.strictEqual(
				(await engine.store.getCharacter(ada.character.id))?.roomId,
				"gate"
			);
			assert.deepStrictEqual(await run(ada, "logout"), ["You are not logged in."]);
		});

		test("should say goodbye and close on quit", async () => {
			engine = await createTestEngine();
			const client = connect(engine);
			assert.deepStrictEqual(await run(client, "exit"), ["Goodbye!"]);
			assert.strictEqual(client.connection.isClosed(), true);
			assert.strictEqual(engine.sessions.getSession(client.session.id), undefined);
		});
	});

	suite("help", () => {
		test("should list the commands available outside the world", async () => {
			engine = await createTestEngine();
			const lines = await run(connect(engine), "help");
			assert.strictEqual(lines[0], "Commands:");
			assert.ok(
				lines.includes(`  ${pad("register <name> <password>", 28)}Create a new account.`)
			);
			assert.ok(!lines.includes("In the world:"));
			assert.ok(!lines.includes(`  ${pad("say <message>", 28)}Speak to everyone in the room.`));
		});

		test("should add in-world commands for players", async () => {
			engine = await createTestEngine();
			const ada = await joinAs(engine, "Ada");
			const lines = await run(ada, "?");
			assert.ok(lines.includes("In the world:"));
			assert.ok(lines.includes(`  ${pad("say <message>", 28)}Speak to everyone in the room.`));
		});

		test("should describe one command by alias or prefix", async () => {
			engine = await createTestEngine();
			const client = connect(engine);
			assert.deepStrictEqual(await run(client, "help n"), [
				"Usage: north",
				"Walk north.",
				"Aliases: n",
			]);
			assert.deepStrictEqual(await run(client, "help reg"), [
				"Usage: register <name> <password>",
				"Create a new account.",
			]);
			assert.deepStrictEqual(await run(client, "help zzz"), [
				"No help is available for 'zzz'.",
			]);
		});
	});
});
