import Table from 'cli-table3';

export function formatTable(
  rows: Array<Record<string, string | number>>,
  options?: Table.TableConstructorOptions,
): string {
  const head = options?.head ?? (rows.length > 0 ? Object.keys(rows[0]) : []);
  const table = new Table({ head, ...options });
  rows.forEach((row) => table.push(Object.values(row).map((v) => String(v))));
  return table.toString();
}
