/**
 * Repair Prompt
 * Used once when the assembled query fails its final check
 */

export function getRepairPrompt(query: string, failureReason: string, targetEnvironment: string): string {
    return `You are a Senior SQL Developer fixing a query for ${targetEnvironment}. You MUST return ONLY the corrected SQL.

The query below failed a trial execution with this error:
${failureReason}

Rules:
1. Minimize change: fix only what the error points at.
2. Keep every CTE name, table alias and output column alias unchanged.
3. Keep comment lines (starting with --) as they are.
4. Do not add tables or columns that the query does not already reference.
5. ONLY RETURN SQL. No explanation, no markdown.

QUERY:
${query}`;
}
