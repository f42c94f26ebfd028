export function getTableName(): string {
  const tableName = process.env['TABLE_NAME'];

  if (!tableName) {
    throw new Error('TABLE_NAME environment variable is not set');
  }

  return tableName;
}
