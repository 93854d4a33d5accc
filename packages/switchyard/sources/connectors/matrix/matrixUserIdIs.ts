const MATRIX_USER_ID = /^@[^\s:@]+:[^\s:]+(?::\d+)?$/;

/**
 * Checks that value looks like `@localpart:server`.
 */
export function matrixUserIdIs(value: string): boolean {
    return MATRIX_USER_ID.test(value);
}
