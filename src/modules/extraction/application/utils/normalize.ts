export function fileBaseName(originalName: string): string {
  return originalName.replace(/\.[^/.]+$/, '').trim();
}

export function fileExtension(path: string): string {
  const match = /\.([^/\\.]+)$/.exec(path);
  return match ? match[1].toLowerCase() : '';
}
