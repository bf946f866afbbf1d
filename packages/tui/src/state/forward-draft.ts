/**
 * Forward draft: the four-field form behind the `f` popup.
 *
 * Fields tied to the active connection are locked: a remote connection
 * fixes the SSH host, a Docker target fixes the remote host to the
 * container IP once that IP is known. The cursor never lands on a locked field.
 */

import { type PortRecord, SSH, parsePort } from "@berth/core";

export type ForwardField = "localPort" | "remoteHost" | "remotePort" | "sshHost";

export const FORWARD_FIELDS: readonly ForwardField[] = [
  "localPort",
  "remoteHost",
  "remotePort",
  "sshHost"
];

export const FORWARD_FIELD_LABELS: Record<ForwardField, string> = {
  localPort: "Local Port",
  remoteHost: "Remote Host",
  remotePort: "Remote Port",
  sshHost: "SSH Host"
};

export interface FieldLocks {
  remoteHost: boolean;
  sshHost: boolean;
}

export interface ForwardDraft {
  localPort: string;
  remoteHost: string;
  remotePort: string;
  sshHost: string;
  activeField: ForwardField;
  locked: FieldLocks;
}

/** What the active connection pins in the form */
export interface ForwardContext {
  remoteHost?: string;
  dockerTarget?: string;
  containerIp?: string;
}

export function emptyForwardDraft(): ForwardDraft {
  return {
    localPort: "",
    remoteHost: "",
    remotePort: "",
    sshHost: "",
    activeField: "localPort",
    locked: { remoteHost: false, sshHost: false }
  };
}

export function isFieldLocked(field: ForwardField, locks: FieldLocks): boolean {
  if (field === "remoteHost") return locks.remoteHost;
  if (field === "sshHost") return locks.sshHost;
  return false;
}

/**
 * Next field in the given direction, skipping locked ones.
 */
export function cycleField(
  field: ForwardField,
  locks: FieldLocks,
  direction: 1 | -1
): ForwardField {
  const count = FORWARD_FIELDS.length;
  let index = FORWARD_FIELDS.indexOf(field);

  // Two skips at most: locked fields are never adjacent
  for (let step = 0; step < 3; step++) {
    index = (index + direction + count) % count;
    const next = FORWARD_FIELDS[index];
    if (next !== undefined && !isFieldLocked(next, locks)) return next;
  }
  return field;
}

export function moveField(draft: ForwardDraft, direction: 1 | -1): ForwardDraft {
  return {
    ...draft,
    activeField: cycleField(draft.activeField, draft.locked, direction)
  };
}

/** Append typed text to the active field; locked fields ignore input */
export function typeInto(draft: ForwardDraft, text: string): ForwardDraft {
  const field = draft.activeField;
  if (isFieldLocked(field, draft.locked)) return draft;
  return { ...draft, [field]: draft[field] + text };
}

export function backspace(draft: ForwardDraft): ForwardDraft {
  const field = draft.activeField;
  if (isFieldLocked(field, draft.locked)) return draft;
  return { ...draft, [field]: draft[field].slice(0, -1) };
}

function isPortField(value: string): boolean {
  return parsePort(value) !== null;
}

function isHostField(value: string): boolean {
  return value.trim().length > 0;
}

export function isFieldValid(draft: ForwardDraft, field: ForwardField): boolean {
  switch (field) {
    case "localPort":
      return isPortField(draft.localPort);
    case "remotePort":
      return isPortField(draft.remotePort);
    case "remoteHost":
      return isHostField(draft.remoteHost);
    case "sshHost":
      return isHostField(draft.sshHost);
  }
}

export function isForwardValid(draft: ForwardDraft): boolean {
  return FORWARD_FIELDS.every((f) => isFieldValid(draft, f));
}

/** Display names of invalid fields, in form order */
export function invalidFieldNames(draft: ForwardDraft): string[] {
  return FORWARD_FIELDS.filter((f) => !isFieldValid(draft, f)).map(
    (f) => FORWARD_FIELD_LABELS[f]
  );
}

export function toSpec(
  draft: ForwardDraft
): { spec: string; host: string } | null {
  if (!isForwardValid(draft)) return null;
  return {
    spec: `${draft.localPort}:${draft.remoteHost}:${draft.remotePort}`,
    host: draft.sshHost
  };
}

/**
 * Draft for the selected record, with the connection's locks applied.
 * Without a record only the locked fields are filled.
 */
export function forwardDraftFor(
  record: PortRecord | undefined,
  context: ForwardContext = {}
): ForwardDraft {
  const draft = emptyForwardDraft();

  if (record) {
    draft.localPort = String(record.localPort);
    draft.remotePort = String(record.localPort);
    draft.remoteHost = SSH.DEFAULT_REMOTE_HOST;
    draft.sshHost = record.sshHost ?? "";
  }

  if (context.remoteHost) {
    draft.sshHost = context.remoteHost;
    draft.locked.sshHost = true;
  }
  // Without a resolved container IP the remote host stays editable
  if (context.dockerTarget && context.containerIp) {
    draft.remoteHost = context.containerIp;
    draft.locked.remoteHost = true;
  }

  draft.activeField =
    record && !draft.locked.sshHost && !draft.sshHost
      ? "sshHost"
      : "localPort";
  return draft;
}
