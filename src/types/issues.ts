import type { z } from "zod";

/**
 * Formats zod issues as indented `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => {
			const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
			return `  - ${path}: ${issue.message}`;
		})
		.join("\n");
}
