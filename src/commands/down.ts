/**
 * Down movement command.
 *
 * @example
 * ```
 * down
 * d
 * ```
 *
 * **Aliases:** `d`
 * @module commands/down
 */

import { DIRECTION } from "../core/room.js";
import { movementCommand } from "./_movement.js";

export const command = movementCommand(DIRECTION.DOWN);
