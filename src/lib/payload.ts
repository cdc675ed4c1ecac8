export interface MorePayload {
  userId: number;
  cursor: number;
  value: string;
}

/** `<user_id>|<cursor_id>|<base64url(value) without padding>` */
export function encodeMorePayload(userId: number, cursor: number, value = ""): string {
  const encoded = value ? Buffer.from(value, "utf-8").toString("base64url") : "";
  return `${userId}|${cursor}|${encoded}`;
}

export function decodeMorePayload(payload: string): MorePayload | null {
  const parts = payload.split("|");
  if (parts.length < 2 || parts.length > 3) {
    return null;
  }

  const [userPart = "", cursorPart = "", valuePart = ""] = parts;
  if (!/^\d+$/.test(userPart) || !/^\d+$/.test(cursorPart)) {
    return null;
  }

  if (valuePart && !/^[A-Za-z0-9_-]+$/.test(valuePart)) {
    return null;
  }

  return {
    userId: Number(userPart),
    cursor: Number(cursorPart),
    value: valuePart ? Buffer.from(valuePart, "base64url").toString("utf-8") : ""
  };
}
