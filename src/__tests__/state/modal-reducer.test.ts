import { describe, expect, it } from "vitest";
import { confirmModal, formModal, modalReducer, type ModalState } from "../../state/modal-reducer";
import { keyFromId } from "../../types/events";

const press = (modal: ModalState, id: string) => modalReducer(modal, keyFromId(id));

function typeText(modal: ModalState, text: string): ModalState {
  let current = modal;
  for (const ch of text) {
    const step = press(current, ch);
    if (step.type !== "open") throw new Error(`modal closed on ${ch}`);
    current = step.modal;
  }
  return current;
}

describe("confirm modal", () => {
  const modal = confirmModal("Delete container", "Delete web?", { kind: "delete-container", id: "c1", name: "web" });

  it.each(["enter", "y", "Y"])("confirms on %s", (id) => {
    expect(press(modal, id)).toEqual({
      type: "confirmed",
      pending: { kind: "delete-container", id: "c1", name: "web" },
      values: [],
    });
  });

  it.each(["esc", "n", "N"])("cancels on %s", (id) => {
    expect(press(modal, id)).toEqual({ type: "cancelled" });
  });

  it("swallows other keys", () => {
    expect(press(modal, "q")).toEqual({ type: "open", modal });
  });
});

describe("form modal", () => {
  const modal = formModal(
    "Create network",
    [{ label: "Name" }, { label: "Driver", value: "bridge", optional: true }],
    { kind: "create-network" },
  );

  it("refuses to submit with a required field empty", () => {
    const step = press(modal, "enter");
    expect(step.type === "open" && step.modal.kind === "form" && step.modal.error).toBe("Name is required");
  });

  it("types into the focused field and submits trimmed values", () => {
    const typed = typeText(modal, " backend ");
    expect(press(typed, "enter")).toEqual({
      type: "confirmed",
      pending: { kind: "create-network" },
      values: ["backend", "bridge"],
    });
  });

  it("moves focus with tab and wraps with shift+tab", () => {
    const next = press(modal, "tab");
    expect(next.type === "open" && next.modal.kind === "form" && next.modal.focus).toBe(1);
    const wrapped = press(modal, "shift+tab");
    expect(wrapped.type === "open" && wrapped.modal.kind === "form" && wrapped.modal.focus).toBe(1);
  });

  it("clears the error once the user edits", () => {
    const failed = press(modal, "enter");
    if (failed.type !== "open") throw new Error("expected the modal to stay open");
    const edited = typeText(failed.modal, "x");
    expect(edited.kind === "form" && edited.error).toBeNull();

    const erased = press(edited, "backspace");
    expect(erased.type === "open" && erased.modal.kind === "form" && erased.modal.fields[0].value).toBe("");
  });

  it("cancels on esc", () => {
    expect(press(modal, "esc")).toEqual({ type: "cancelled" });
  });
});
