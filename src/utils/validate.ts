import {z, ZodError, ZodIssue, ZodTypeAny} from 'zod';

export function formatIssues(issues: ZodIssue[]): string {
    return issues
        .map((issue: ZodIssue) => issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
        .join(', ');
}

/**
 * Validates data against a Zod schema and throws a detailed error if validation fails
 * @param label - Names the data in the error message
 * @returns The validated data with proper typing
 */
export function validateData<S extends ZodTypeAny>(schema: S, data: unknown, label: string): z.output<S> {
    try {
        return schema.parse(data);
    } catch (error) {
        if (error instanceof ZodError) {
            throw new Error(`Invalid ${label}: ${formatIssues(error.issues)}`);
        }
        throw error;
    }
}

/**
 * Validates without throwing
 */
export function safeValidateData<S extends ZodTypeAny>(
    schema: S,
    data: unknown
): { success: true; data: z.output<S> } | { success: false; error: string } {
    const result = schema.safeParse(data);

    if (result.success) {
        return {success: true, data: result.data};
    }

    return {success: false, error: formatIssues(result.error.issues)};
}
