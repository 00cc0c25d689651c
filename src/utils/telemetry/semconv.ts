/**
 * @fileoverview Code-location attribute names used on tool spans, kept
 * local so they do not move with `@opentelemetry/semantic-conventions`
 * releases.
 * @module src/utils/telemetry/semconv
 */

/** Function name of the instrumented unit; the tool name here. */
export const ATTR_CODE_FUNCTION = "code.function";

/** Namespace owning `code.function`. */
export const ATTR_CODE_NAMESPACE = "code.namespace";
