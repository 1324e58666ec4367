export type ActorRole = "NONE" | "OPERATOR" | "SUPER_ADMIN";

export type Actor = {
  id: string;
  username: string;
  role: ActorRole;
};

const ROLE_CAPABILITIES: Record<ActorRole, readonly string[]> = {
  NONE: ["read"],
  OPERATOR: ["read", "edit_dashboard"],
  SUPER_ADMIN: ["read", "edit_dashboard", "manage_options", "manage_users"]
};

export function normalizeActorRole(input: unknown): ActorRole {
  const raw = typeof input === "string" ? input.trim().toUpperCase() : "";
  if (raw === "SUPER_ADMIN") return "SUPER_ADMIN";
  if (raw === "OPERATOR") return "OPERATOR";
  return "NONE";
}

export function capabilitiesForRole(role: ActorRole): readonly string[] {
  return ROLE_CAPABILITIES[role];
}

export function can(actor: Actor | undefined, capability: string): boolean {
  if (!actor || !capability) return false;
  return capabilitiesForRole(normalizeActorRole(actor.role)).includes(capability);
}

export const capabilityAuthorizer = { can };
