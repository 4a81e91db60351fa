/**
 * North movement command.
 *
 * @example
 * ```
 * north
 * n
 * ```
 *
 * **Aliases:** `n`
 * @module commands/north
 */

import { DIRECTION } from "../core/room.js";
import { movementCommand } from "./_movement.js";

export const command = movementCommand(DIRECTION.NORTH);
