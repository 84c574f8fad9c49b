/**
 * Extract a printable message from a thrown value.
 *
 * @pure true
 * @complexity O(1)
 */
export function getErrorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}
