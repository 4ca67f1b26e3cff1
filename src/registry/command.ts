/**
 * Registry: command - centralized verb-to-handler registry
 *
 * Maps canonical verbs (TAKE, TURN_ON, LOOK_UNDER) to the command objects
 * that handle them. The commands package fills the default registry at
 * start-up; tests may build their own {@link CommandRegistry}.
 *
 * When two command objects claim the same verb the one with the higher
 * priority keeps it. Ties go to whichever registered first.
 *
 * @module registry/command
 */

import { PRIORITY, verbsOf, type CommandObject } from "../core/command.js";
import logger from "../utils/logger.js";

export class CommandRegistry {
	private readonly handlers = new Map<string, CommandObject>();

	/**
	 * Register a command object under each verb it handles.
	 *
	 * @example
	 * ```typescript
	 * const registry = new CommandRegistry();
	 * registry.register(take);
	 * registry.get("TAKE"); // take
	 * ```
	 */
	register(command: CommandObject): void {
		const priority = command.priority ?? PRIORITY.NORMAL;
		for (const verb of verbsOf(command)) {
			const existing = this.handlers.get(verb);
			if (existing) {
				const existingPriority = existing.priority ?? PRIORITY.NORMAL;
				if (existingPriority >= priority) {
					logger.debug(`Verb ${verb} already handled; keeping existing handler`);
					continue;
				}
				logger.debug(`Verb ${verb} taken over by higher priority handler`);
			}
			this.handlers.set(verb, command);
		}
	}

	/**
	 * Remove a command object from every verb it still owns.
	 * Uses reference equality.
	 */
	unregister(command: CommandObject): void {
		for (const [verb, handler] of this.handlers) {
			if (handler === command) this.handlers.delete(verb);
		}
	}

	get(verb: string): CommandObject | undefined {
		return this.handlers.get(verb);
	}

	has(verb: string): boolean {
		return this.handlers.has(verb);
	}

	/** Every handled verb, sorted. */
	verbs(): string[] {
		return [...this.handlers.keys()].sort();
	}

	/** Distinct command objects, in registration order. */
	commands(): CommandObject[] {
		return [...new Set(this.handlers.values())];
	}

	clear(): void {
		this.handlers.clear();
	}
}

/** The registry the commands package loads into. */
const DEFAULT_REGISTRY = new CommandRegistry();

export function getCommandRegistry(): CommandRegistry {
	return DEFAULT_REGISTRY;
}
