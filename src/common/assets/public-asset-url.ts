/** Absolute URL of an uploaded file: `{base}/uploads/{key}`. */
export function publicAssetUrl(params: { publicBaseUrl: string; key: string }): string {
  const base = params.publicBaseUrl.trim().replace(/\/+$/, '');
  const key = params.key.trim().replace(/^\/+/, '');
  return `${base}/uploads/${key}`;
}
