/**
 * East movement command.
 *
 * @example
 * ```
 * east
 * e
 * ```
 *
 * **Aliases:** `e`
 * @module commands/east
 */

import { DIRECTION } from "../core/room.js";
import { movementCommand } from "./_movement.js";

export const command = movementCommand(DIRECTION.EAST);
