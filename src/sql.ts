export interface SqlStatement {
  sql: string;
  params: unknown[];
}

/**
 * Escape a PostgreSQL identifier (table or column name).
 * Doubles any embedded double-quotes to prevent SQL injection.
 */
export function escapeIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Build an UPDATE for the columns present in `values`, keyed by `id`,
 * returning the updated row. Undefined values are left out.
 * `casts` appends a type cast to a column's placeholder (e.g. `text::jsonb`).
 * Returns null when there is nothing to set.
 */
export function buildUpdateById(
  table: string,
  id: number,
  values: Readonly<Record<string, unknown>>,
  casts: Readonly<Record<string, string>> = {}
): SqlStatement | null {
  const setCols = Object.keys(values).filter(col => values[col] !== undefined);
  if (setCols.length === 0) {
    return null;
  }

  const params: unknown[] = [];

  // SET clause
  const setClause = setCols.map((col, i) => {
    params.push(values[col]);
    const cast = casts[col] !== undefined ? `::${casts[col]}` : '';
    return `${escapeIdentifier(col)} = $${i + 1}${cast}`;
  }).join(', ');

  params.push(id);
  const sql = `UPDATE ${escapeIdentifier(table)} SET ${setClause} WHERE "id" = $${setCols.length + 1} RETURNING *`;

  return { sql, params };
}
