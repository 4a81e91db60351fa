/**
 * South movement command.
 *
 * @example
 * ```
 * south
 * s
 * ```
 *
 * **Aliases:** `s`
 * @module commands/south
 */

import { DIRECTION } from "../core/room.js";
import { movementCommand } from "./_movement.js";

export const command = movementCommand(DIRECTION.SOUTH);
