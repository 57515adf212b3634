/**
 * Utility functions for the paramspace packages.
 *
 * @module @paramspace/common/utils
 */

export { envBool, envEnum, envStr } from "./env";
export { hashObject, sha256Hash, stableStringify } from "./hash";
