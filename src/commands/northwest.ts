/**
 * Northwest movement command.
 *
 * @example
 * ```
 * northwest
 * nw
 * ```
 *
 * **Aliases:** `nw`
 * @module commands/northwest
 */

import { DIRECTION } from "../core/room.js";
import { movementCommand } from "./_movement.js";

export const command = movementCommand(DIRECTION.NORTHWEST);
