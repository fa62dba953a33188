// Endpoint paths of the media API, relative to the configured base URL
export const paths = {
  info: '/info',
  users: '/users',
  user: '/user',
  database: '/database',
  entry: '/entry',
  entryFile: '/entry/file',
} as const;

export function attachmentDisposition(filename: string): string {
  return `attachment; filename="${filename}"`;
}
