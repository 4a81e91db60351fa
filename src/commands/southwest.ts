/**
 * Southwest movement command.
 *
 * @example
 * ```
 * southwest
 * sw
 * ```
 *
 * **Aliases:** `sw`
 * @module commands/southwest
 */

import { DIRECTION } from "../core/room.js";
import { movementCommand } from "./_movement.js";

export const command = movementCommand(DIRECTION.SOUTHWEST);
