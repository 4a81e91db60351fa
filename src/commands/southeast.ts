/**
 * Southeast movement command.
 *
 * @example
 * ```
 * southeast
 * se
 * ```
 *
 * **Aliases:** `se`
 * @module commands/southeast
 */

import { DIRECTION } from "../core/room.js";
import { movementCommand } from "./_movement.js";

export const command = movementCommand(DIRECTION.SOUTHEAST);
