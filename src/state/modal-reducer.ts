import type { KeyStroke } from "../types/events";

/** What confirming a modal will do. */
export type PendingAction =
  | { kind: "delete-container"; id: string; name: string }
  | { kind: "delete-image"; id: string; name: string }
  | { kind: "delete-volume"; name: string }
  | { kind: "prune-volumes" }
  | { kind: "delete-group"; id: string; name: string }
  | { kind: "delete-network"; id: string; name: string }
  | { kind: "remove-from-group"; groupId: string; containerId: string; name: string }
  | { kind: "disconnect-network"; networkId: string; containerId: string; name: string }
  | { kind: "create-group" }
  | { kind: "create-network" }
  | { kind: "pull-image" }
  | { kind: "env-add" }
  | { kind: "env-edit"; index: number };

export interface FormField {
  label: string;
  value: string;
  optional: boolean;
}

export type ModalState =
  | { kind: "confirm"; title: string; message: string; pending: PendingAction }
  | {
      kind: "form";
      title: string;
      fields: FormField[];
      focus: number;
      error: string | null;
      pending: PendingAction;
    };

/** Outcome of feeding one key to an open modal. */
export type ModalStep =
  | { type: "open"; modal: ModalState }
  | { type: "confirmed"; pending: PendingAction; values: string[] }
  | { type: "cancelled" };

export function confirmModal(title: string, message: string, pending: PendingAction): ModalState {
  return { kind: "confirm", title, message, pending };
}

export function formModal(
  title: string,
  fields: Array<{ label: string; value?: string; optional?: boolean }>,
  pending: PendingAction,
): ModalState {
  return {
    kind: "form",
    title,
    fields: fields.map((f) => ({ label: f.label, value: f.value ?? "", optional: f.optional ?? false })),
    focus: 0,
    error: null,
    pending,
  };
}

/**
 * Pure key handling for modals. A modal consumes every key while open.
 */
export function modalReducer(modal: ModalState, key: KeyStroke): ModalStep {
  if (modal.kind === "confirm") {
    switch (key.id) {
      case "enter":
      case "y":
      case "Y":
        return { type: "confirmed", pending: modal.pending, values: [] };
      case "esc":
      case "n":
      case "N":
        return { type: "cancelled" };
      default:
        return { type: "open", modal };
    }
  }

  const count = modal.fields.length;
  switch (key.id) {
    case "esc":
      return { type: "cancelled" };

    case "tab":
    case "down":
      return { type: "open", modal: { ...modal, focus: (modal.focus + 1) % count } };

    case "shift+tab":
    case "up":
      return { type: "open", modal: { ...modal, focus: (modal.focus - 1 + count) % count } };

    case "enter": {
      const missing = modal.fields.find((f) => !f.optional && !f.value.trim());
      if (missing) {
        return { type: "open", modal: { ...modal, error: `${missing.label} is required` } };
      }
      return { type: "confirmed", pending: modal.pending, values: modal.fields.map((f) => f.value.trim()) };
    }

    case "backspace":
      return { type: "open", modal: editFocused(modal, (v) => v.slice(0, -1)) };

    default:
      if (!key.text) return { type: "open", modal };
      return { type: "open", modal: editFocused(modal, (v) => v + key.text) };
  }
}

function editFocused(
  modal: Extract<ModalState, { kind: "form" }>,
  edit: (value: string) => string,
): ModalState {
  const fields = modal.fields.map((f, i) => (i === modal.focus ? { ...f, value: edit(f.value) } : f));
  return { ...modal, fields, error: null };
}
