/**
 * Shared Proto object utilities.
 *
 * Provides the Inspectable and Pipeable protocol implementations common to
 * the data types of this package.
 *
 * @since 0.1.0
 * @internal
 */

import { NodeInspectSymbol } from "effect/Inspectable"
import { pipeArguments } from "effect/Pipeable"

/**
 * Anything rendered through its `toJSON` representation.
 * @internal
 */
interface JsonRepresentable {
  toJSON(): unknown
}

/**
 * Creates common Proto object methods.
 *
 * This factory provides consistent implementations of:
 * - the type identifier marker
 * - NodeInspectSymbol (uses toJSON)
 * - pipe (uses pipeArguments)
 *
 * `toString` and `toJSON` are left to each data type.
 *
 * @internal
 */
export const makeProtoBase = (typeId: symbol) => ({
  [typeId]: typeId,
  [NodeInspectSymbol](this: JsonRepresentable) {
    return this.toJSON()
  },
  pipe() {
    return pipeArguments(this, arguments)
  }
})
