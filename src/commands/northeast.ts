/**
 * Northeast movement command.
 *
 * @example
 * ```
 * northeast
 * ne
 * ```
 *
 * **Aliases:** `ne`
 * @module commands/northeast
 */

import { DIRECTION } from "../core/room.js";
import { movementCommand } from "./_movement.js";

export const command = movementCommand(DIRECTION.NORTHEAST);
