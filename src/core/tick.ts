/**
 * Core tick module.
 *
 * Runs named maintenance callbacks on a fixed interval. Callbacks run one
 * after another, a failing callback is logged and does not stop the rest,
 * and a tick that is still running when the next one is due causes that
 * next tick to be skipped.
 *
 * @example
 * const ticks = new TickLoop(30_000);
 * ticks.register("regen", () => regenerateEveryone());
 * ticks.start();
 *
 * @module core/tick
 */
import logger, { describeError } from "../utils/logger.js";

export type TickCallback = () => Promise<void> | void;

interface NamedCallback {
	name: string;
	run: TickCallback;
}

export class TickLoop {
	private readonly intervalMs: number;
	private readonly callbacks: NamedCallback[] = [];
	private timer?: NodeJS.Timeout;
	private running = false;
	private ticks = 0;

	constructor(intervalMs: number) {
		this.intervalMs = intervalMs;
	}

	get tickCount(): number {
		return this.ticks;
	}

	public isStarted(): boolean {
		return this.timer !== undefined;
	}

	public register(name: string, run: TickCallback): void {
		this.callbacks.push({ name, run });
		logger.debug(`Registered tick callback: ${name}`);
	}

	public start(): void {
		if (this.timer) return;
		this.timer = setInterval(() => {
			this.tick().catch((error: unknown) =>
				logger.error("Tick failed", { error: describeError(error) })
			);
		}, this.intervalMs);
		logger.info(`Tick loop started (every ${this.intervalMs}ms)`);
	}

	public stop(): void {
		if (!this.timer) return;
		clearInterval(this.timer);
		this.timer = undefined;
		logger.info("Tick loop stopped");
	}

	/**
	 * Run every callback once, in registration order.
	 *
	 * @returns false when skipped because the previous tick has not finished
	 */
	public async tick(): Promise<boolean> {
		if (this.running) {
			logger.warn("Previous tick still running; skipping");
			return false;
		}
		this.running = true;
		this.ticks++;
		try {
			for (const callback of this.callbacks) {
				try {
					await callback.run();
				} catch (error) {
					logger.error(`Tick callback ${callback.name} failed`, {
						error: describeError(error),
					});
				}
			}
		} finally {
			this.running = false;
		}
		return true;
	}
}
