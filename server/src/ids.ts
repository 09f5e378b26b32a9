import { randomUUID } from "crypto";

export const ID_PREFIXES = {
  doctor: "doc",
  patient: "pat",
  prescription: "pres",
  medicine: "med",
  healthTip: "tip",
  notification: "notif",
  followUp: "follow",
  user: "usr",
} as const;

export type EntityKind = keyof typeof ID_PREFIXES;

// Kinds shown to people get a short hex token instead of a full UUID.
const SHORT_TOKEN_KINDS: ReadonlySet<EntityKind> = new Set<EntityKind>(["prescription", "healthTip", "user"]);
const SHORT_TOKEN_LENGTH = 12;

const isEntityKind = (value: string): value is EntityKind => Object.prototype.hasOwnProperty.call(ID_PREFIXES, value);

export const newId = (kind: EntityKind): string => {
  const uuid = randomUUID();
  const token = SHORT_TOKEN_KINDS.has(kind) ? uuid.replace(/-/g, "").slice(0, SHORT_TOKEN_LENGTH) : uuid;
  return `${ID_PREFIXES[kind]}-${token}`;
};

/**
 * Maps an identifier back to the entity kind its prefix names.
 * Returns undefined for identifiers without a known prefix.
 */
export const kindOf = (id: string): EntityKind | undefined => {
  const dash = id.indexOf("-");
  if (dash <= 0) return undefined;
  const prefix = id.slice(0, dash);
  const match = Object.entries(ID_PREFIXES).find(([, p]) => p === prefix);
  return match && isEntityKind(match[0]) ? match[0] : undefined;
};
