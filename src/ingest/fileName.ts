const FALLBACK_FILE_NAME = "judgment.pdf";

function fromContentDisposition(header: string | undefined): string | undefined {
  if (!header || !header.includes("filename=")) {
    return undefined;
  }
  const raw = header.slice(header.lastIndexOf("filename=") + "filename=".length).split(";")[0];
  const cleaned = raw.replace(/^["'\s]+|["'\s]+$/g, "");
  return cleaned || undefined;
}

function fromUrl(url: string): string | undefined {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url;
  }
  const segment = pathname.replace(/\/+$/, "").split("/").pop();
  return segment ? `${segment}.pdf` : undefined;
}

/**
 * File name of a downloaded judgment: the `filename=` parameter of the
 * Content-Disposition header, else the URL's last path segment with `.pdf` appended.
 */
export function resolveFileName(headers: Record<string, string>, url: string): string {
  const disposition = Object.entries(headers).find(([name]) => name.toLowerCase() === "content-disposition")?.[1];
  return fromContentDisposition(disposition) ?? fromUrl(url) ?? FALLBACK_FILE_NAME;
}
