export const escapeHtml = (value: string) =>
  value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");

export const escapeAttr = (value: string) =>
  escapeHtml(value).replace(/"/g, "&quot;");

export const normalizeTitle = (value: string) =>
  value.normalize("NFC").trim().replace(/\s+/g, " ").toLowerCase();

export const isLikelyEncoded = (raw: string) => {
  const sample = raw.slice(0, 120000);
  let totalChars = 0;
  let base64Chars = 0;
  let longestBase64Run = 0;
  let currentRun = 0;
  for (let i = 0; i < sample.length; i += 1) {
    const ch = sample[i];
    if (ch.trim()) {
      totalChars += 1;
    }
    if (/[A-Za-z0-9+/=]/.test(ch)) {
      base64Chars += 1;
      currentRun += 1;
      if (currentRun > longestBase64Run) longestBase64Run = currentRun;
    } else {
      currentRun = 0;
    }
  }
  if (totalChars < 20000) return false;
  const ratio = base64Chars / totalChars;
  return longestBase64Run >= 5000 && ratio >= 0.97;
};

export const readStyle = (style: string, property: string) => {
  const pattern = new RegExp(`(?:^|;)\\s*${property.replace(/[-]/g, "\\-")}\\s*:\\s*([^;]+)`, "i");
  const match = style.match(pattern);
  return match ? match[1].trim() : null;
};
