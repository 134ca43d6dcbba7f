/**
 * Shell Utilities - quoting and input validation for command strings
 */

// =============================================================================
// Shell Escaping
// =============================================================================

/**
 * Quote a string for safe interpolation into a POSIX shell command.
 *
 * Wraps the value in single quotes; embedded single quotes become '\''.
 * Nothing inside single quotes is special to the shell, so `$()`, backticks
 * and variables stay literal.
 *
 * @example
 * ```typescript
 * shellEscape("my-org/my repo")   // "'my-org/my repo'"
 * shellEscape("it's")             // "'it'\\''s'"
 * ```
 */
export function shellEscape(str: string): string {
    return "'" + str.replace(/'/g, "'\\''") + "'";
}

// =============================================================================
// Input Validation
// =============================================================================

/**
 * Parse a strictly positive integer (e.g. a `--limit` value).
 * Accepts numbers or all-digit strings; throws otherwise.
 *
 * @example
 * ```typescript
 * validatePositiveInteger("5000")       // 5000
 * validatePositiveInteger("0")          // throws
 * validatePositiveInteger("10; rm")     // throws
 * ```
 */
export function validatePositiveInteger(value: unknown, fieldName = 'value'): number {
    let parsed: number;
    if (typeof value === 'string') {
        if (!/^\d+$/.test(value)) {
            throw new Error(`Invalid ${fieldName}: must be a positive integer`);
        }
        parsed = parseInt(value, 10);
    } else if (typeof value === 'number' && Number.isInteger(value)) {
        parsed = value;
    } else {
        throw new Error(`Invalid ${fieldName}: must be a positive integer`);
    }

    if (parsed < 1) {
        throw new Error(`Invalid ${fieldName}: must be a positive integer`);
    }
    return parsed;
}

/**
 * Validate that a string only uses characters from a safe set
 * (letters, digits, dot, underscore, hyphen by default).
 *
 * @example
 * ```typescript
 * validateSafeString("prod")          // "prod"
 * validateSafeString("dev-eu.1")      // "dev-eu.1"
 * validateSafeString("../secrets")    // throws
 * ```
 */
export function validateSafeString(
    value: string,
    fieldName = 'value',
    pattern: RegExp = /^[a-zA-Z0-9._-]+$/
): string {
    if (!pattern.test(value) || value.includes('..')) {
        throw new Error(`Invalid ${fieldName}: contains unsafe characters`);
    }
    return value;
}
