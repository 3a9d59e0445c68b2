const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => ESCAPES[char] ?? char);
}

function toTagName(key: string): string {
  const tag = key.replace(/[^A-Za-z0-9_.-]/g, "_");
  return /^[A-Za-z_]/.test(tag) ? tag : `_${tag}`;
}

export default function jsonToXml(obj: unknown, root = "root"): string {
  const convert = (data: unknown, tag: string): string => {
    const name = toTagName(tag);
    if (data === null || data === undefined) {
      return `<${name}/>`;
    }
    if (Array.isArray(data)) {
      return `<${name}>${data.map((item) => convert(item, "item")).join("")}</${name}>`;
    }
    if (typeof data === "object") {
      const inner = Object.entries(data)
        .map(([k, v]) => convert(v, k))
        .join("");
      return `<${name}>${inner}</${name}>`;
    }
    return `<${name}>${escapeXml(String(data))}</${name}>`;
  };
  return `<?xml version="1.0"?>${convert(obj, root)}`;
}
