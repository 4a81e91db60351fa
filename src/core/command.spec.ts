import { test, suite } from "node:test";
import assert from "node:assert";
import { CommandRegistry, isCommand, type Command } from "./command.js";

function stub(
	name: string,
	options: Partial<Omit<Command, "name" | "execute">> = {}
): Command {
	return {
		name,
		usage: name,
		description: `The ${name} command.`,
		execute: () => undefined,
		...options,
	};
}

suite("command.ts", () => {
	suite("CommandRegistry", () => {
		test("should find a command by name and alias, ignoring case", () => {
			const registry = new CommandRegistry();
			const north = stub("north", { aliases: ["n"] });
			registry.register(north);
			assert.strictEqual(registry.get("north"), north);
			assert.strictEqual(registry.get("n"), north);
			assert.strictEqual(registry.get("N"), north);
			assert.strictEqual(registry.get("NORTH"), north);
			assert.strictEqual(registry.get("no"), undefined);
		});

		test("should refuse a verb that is already taken", () => {
			const registry = new CommandRegistry();
			registry.register(stub("say", { aliases: ["'"] }));
			assert.throws(() => registry.register(stub("shout", { aliases: ["SAY"] })), {
				message: 'Verb "say" of command shout is already registered by say',
			});
			assert.strictEqual(registry.get("shout"), undefined);
			assert.strictEqual(registry.size, 1);
		});

		test("should refuse a verb repeated within one command", () => {
			const registry = new CommandRegistry();
			assert.throws(() => registry.register(stub("north", { aliases: ["n", "N"] })), {
				message: 'Verb "n" appears twice in command north',
			});
			assert.throws(() => registry.register(stub("look", { aliases: ["LOOK"] })), {
				message: 'Verb "look" appears twice in command look',
			});
			assert.strictEqual(registry.size, 0);
			assert.strictEqual(registry.get("n"), undefined);
		});

		test("should refuse empty names and aliases", () => {
			const registry = new CommandRegistry();
			assert.throws(() => registry.register(stub("  ")), {
				message: "Command name must not be empty",
			});
			assert.throws(() => registry.register(stub("look", { aliases: [""] })), {
				message: "Command look has an empty alias",
			});
		});

		test("should list each command once in registration order", () => {
			const registry = new CommandRegistry();
			const look = stub("look", { aliases: ["l"] });
			const quit = stub("quit", { aliases: ["exit"] });
			registry.register(look);
			registry.register(quit);
			assert.deepStrictEqual(registry.getAllCommands(), [look, quit]);
		});

		test("should filter help by the character gate", () => {
			const registry = new CommandRegistry();
			const login = stub("login");
			const say = stub("say", { requiresCharacter: true });
			const who = stub("who", { requiresCharacter: false });
			registry.register(login);
			registry.register(say);
			registry.register(who);
			assert.deepStrictEqual(registry.getCommandsForHelp(false), [login, who]);
			assert.deepStrictEqual(registry.getCommandsForHelp(true), [say]);
			assert.deepStrictEqual(registry.getCommandsForHelp(), [login, say, who]);
		});
	});

	suite("isCommand()", () => {
		test("should accept a complete command", () => {
			assert.strictEqual(isCommand(stub("look")), true);
		});

		test("should reject anything missing a field", () => {
			assert.strictEqual(isCommand({ name: "look", usage: "look" }), false);
			assert.strictEqual(isCommand(null), false);
			assert.strictEqual(isCommand("look"), false);
		});
	});
});
