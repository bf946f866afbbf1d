import type { Connection } from "@berth/core";

export type ConnectionField = "name" | "remoteHost" | "dockerTarget";

export const CONNECTION_FIELDS: readonly ConnectionField[] = [
  "name",
  "remoteHost",
  "dockerTarget"
];

export const CONNECTION_FIELD_LABELS: Record<ConnectionField, string> = {
  name: "Name",
  remoteHost: "Remote Host",
  dockerTarget: "Docker Target"
};

export interface ConnectionDraft {
  name: string;
  remoteHost: string;
  dockerTarget: string;
  activeField: ConnectionField;
}

export function emptyConnectionDraft(): ConnectionDraft {
  return { name: "", remoteHost: "", dockerTarget: "", activeField: "name" };
}

export function cycleConnectionField(
  draft: ConnectionDraft,
  direction: 1 | -1
): ConnectionDraft {
  const count = CONNECTION_FIELDS.length;
  const index = CONNECTION_FIELDS.indexOf(draft.activeField);
  const next = CONNECTION_FIELDS[(index + direction + count) % count];
  return next === undefined ? draft : { ...draft, activeField: next };
}

export function typeIntoConnection(
  draft: ConnectionDraft,
  text: string
): ConnectionDraft {
  const field = draft.activeField;
  return { ...draft, [field]: draft[field] + text };
}

export function backspaceConnection(draft: ConnectionDraft): ConnectionDraft {
  const field = draft.activeField;
  return { ...draft, [field]: draft[field].slice(0, -1) };
}

export function isConnectionDraftValid(draft: ConnectionDraft): boolean {
  return draft.name.trim().length > 0;
}

export function toConnection(draft: ConnectionDraft): Connection | null {
  if (!isConnectionDraftValid(draft)) return null;
  const remoteHost = draft.remoteHost.trim();
  const dockerTarget = draft.dockerTarget.trim();
  return {
    name: draft.name.trim(),
    remoteHost: remoteHost || undefined,
    dockerTarget: dockerTarget || undefined
  };
}
