/**
 * West movement command.
 *
 * @example
 * ```
 * west
 * w
 * ```
 *
 * **Aliases:** `w`
 * @module commands/west
 */

import { DIRECTION } from "../core/room.js";
import { movementCommand } from "./_movement.js";

export const command = movementCommand(DIRECTION.WEST);
