/**
 * Up movement command.
 *
 * @example
 * ```
 * up
 * u
 * ```
 *
 * **Aliases:** `u`
 * @module commands/up
 */

import { DIRECTION } from "../core/room.js";
import { movementCommand } from "./_movement.js";

export const command = movementCommand(DIRECTION.UP);
