/**
 * Snippet loaded by the "Load Example" button.
 */
export const EXAMPLE_SNIPPET = `def fibonacci(n):
    if n <= 0:
        return "Input must be positive"
    elif n == 1:
        return 0
    elif n == 2:
        return 1
    else:
        return fibonacci(n-1) + fibonacci(n-2)
`;
