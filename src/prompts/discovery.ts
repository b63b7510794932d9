/**
 * Discovery Prompt
 * Extracts the MAPPING MODEL (tables, joins, outputs, filters, rules) from an
 * unstructured mapping document as JSON
 */

import type { SheetExtract } from '../types';

export function getDiscoveryPrompt(documentText: string, sheets: SheetExtract[] = [], previousError?: string): string {
    const sheetBlock = sheets.length > 0
        ? sheets.map((s) => `--- SHEET: ${s.name} ---\n${s.text}`).join('\n\n')
        : documentText;
    const retryBlock = previousError
        ? `\nYOUR PREVIOUS ANSWER WAS REJECTED: ${previousError}\nReturn a corrected JSON object.\n`
        : '';

    return `You are a SQL expert analyzing mapping information extracted from a spreadsheet with one or more sheets.

The content is vague and unstructured. It may describe:
- Table names and column mappings
- Join relationships in natural language
- Business logic and transformation rules
- Output requirements and filters

Extract and return ONLY a valid JSON object with this exact structure:
{
    "tables": [
        { "name": "table_name", "alias": "optional_alias", "schema": "optional_schema", "columns": ["col1", "col2"], "description": "what this table represents" }
    ],
    "relationships": [
        { "left_table": "table1", "right_table": "table2", "join_type": "INNER|LEFT|RIGHT|FULL", "join_condition": "table1.id = table2.table1_id or null", "description": "natural language description" }
    ],
    "output_columns": [
        { "table": "table_name", "column": "column_name", "alias": "optional_alias", "aggregation": "SUM|COUNT|AVG|MIN|MAX or null", "transformation": "business logic or null", "depends_on": ["aliases of other output columns this one is computed from"] }
    ],
    "filters": [
        { "table": "table_name", "column": "column_name", "operator": "=|>|<|LIKE|IN|etc", "value": "filter_value", "condition": "WHERE|HAVING", "description": "business rule" }
    ],
    "business_logic": [
        { "rule": "description of business rule", "implementation": "how to implement in SQL", "applies_to": "table or column this affects" }
    ],
    "metadata": {
        "description": "what this mapping accomplishes",
        "complexity": "SIMPLE|MEDIUM|COMPLEX",
        "business_domain": "finance|sales|hr|etc if identifiable"
    }
}

IMPORTANT INSTRUCTIONS:
- List every column of a table that any join, output or filter uses
- Join conditions may be described in business terms: translate them to SQL using table aliases or names
- If a join condition is not stated, set "join_condition" to null rather than guessing
- Column mappings may be in separate sections: connect them
- Sheet names often indicate content type
- Use null or empty arrays for missing information
${retryBlock}
CONTENT TO ANALYZE:
${sheetBlock}

Return only the JSON object, no other text:`;
}
