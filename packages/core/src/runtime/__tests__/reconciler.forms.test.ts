import { assert, describe, test } from "@rerun-ui/testkit";
import { RerunUiError } from "../../abi.js";
import type { ButtonGroupDescriptor, ValueUpdate } from "../../protocol/types.js";
import { createButtonGroupReconciler } from "../reconciler.js";

function group(id: string, overrides: Partial<ButtonGroupDescriptor> = {}): ButtonGroupDescriptor {
  return {
    id,
    options: [
      { content: "A", selectedContent: "" },
      { content: "B", selectedContent: "" },
      { content: "C", selectedContent: "" },
    ],
    defaultIndices: [],
    disabled: false,
    clickMode: "SINGLE_SELECT",
    formId: "f1",
    value: [],
    setValue: false,
    selectionVisualization: "ONLY_SELECTED",
    ...overrides,
  };
}

function setup() {
  const emitted: ValueUpdate[] = [];
  const warnings: string[] = [];
  const reconciler = createButtonGroupReconciler({
    emit: (update) => emitted.push(update),
    warn: (message) => warnings.push(message),
    devMode: true,
  });
  return { reconciler, emitted, warnings };
}

describe("reconciler - forms", () => {
  test("clicks inside a form are buffered until submit", () => {
    const { reconciler, emitted } = setup();
    reconciler.applyRenderPass({ scriptRunId: 1, widgets: [group("w1"), group("w2")] });

    assert.equal(reconciler.click("w1", 0), "buffered");
    assert.equal(reconciler.click("w1", 1), "buffered");
    assert.equal(reconciler.click("w2", 2), "buffered");
    assert.deepEqual(emitted, []);
    assert.equal(reconciler.hasPendingForm("f1"), true);

    const updates = reconciler.submitForm("f1");
    assert.deepEqual(updates, [
      { id: "w1", value: [1] },
      { id: "w2", value: [2] },
    ]);
    assert.deepEqual(emitted, updates);
    assert.equal(reconciler.hasPendingForm("f1"), false);
    assert.deepEqual(reconciler.getState("w1")?.committed, [1]);
  });

  test("only touched widgets of the submitted form flush", () => {
    const { reconciler } = setup();
    reconciler.applyRenderPass({
      scriptRunId: 1,
      widgets: [group("w1"), group("w2"), group("other", { formId: "f2" })],
    });
    reconciler.click("w2", 1);
    reconciler.click("other", 0);
    assert.deepEqual(reconciler.submitForm("f1"), [{ id: "w2", value: [1] }]);
    assert.equal(reconciler.hasPendingForm("f2"), true);
  });

  test("a submit with nothing pending emits nothing and warns once", () => {
    const { reconciler, emitted, warnings } = setup();
    reconciler.applyDescriptor(group("w1"));
    assert.deepEqual(reconciler.submitForm("f1"), []);
    assert.deepEqual(reconciler.submitForm("f1"), []);
    assert.deepEqual(emitted, []);
    assert.deepEqual(warnings, ['[rerun-ui][reconciler] form "f1" submitted with no pending changes']);
  });

  test("submit requires a form id", () => {
    const { reconciler } = setup();
    assert.throws(
      () => reconciler.submitForm(""),
      (err: unknown) => err instanceof RerunUiError && err.code === "RRUI_INVALID_PROPS",
    );
  });

  test("a server rerun without setValue keeps the pending selection", () => {
    const { reconciler } = setup();
    reconciler.applyDescriptor(group("w1"));
    reconciler.click("w1", 0);
    const state = reconciler.applyDescriptor(group("w1"));
    assert.deepEqual(state.selection, [0]);
    assert.equal(state.formPending, true);
  });

  test("a server push replaces the pending selection", () => {
    const { reconciler } = setup();
    reconciler.applyDescriptor(group("w1"));
    reconciler.click("w1", 0);
    const state = reconciler.applyDescriptor(group("w1", { value: [2], setValue: true }));
    assert.deepEqual(state.selection, [2]);
    assert.equal(state.formPending, false);
    assert.equal(reconciler.hasPendingForm("f1"), false);
  });

  test("disabled widgets keep their buffered value but do not flush", () => {
    const { reconciler } = setup();
    reconciler.applyDescriptor(group("w1"));
    reconciler.click("w1", 1);
    reconciler.applyDescriptor(group("w1", { disabled: true }));
    assert.deepEqual(reconciler.submitForm("f1"), []);
    assert.deepEqual(reconciler.getState("w1")?.selection, [1]);
    assert.equal(reconciler.getState("w1")?.formPending, true);
  });

  test("a widget leaving its form commits the buffered value", () => {
    const { reconciler, emitted } = setup();
    reconciler.applyDescriptor(group("w1"));
    reconciler.click("w1", 2);
    const state = reconciler.applyDescriptor(group("w1", { formId: "" }));
    assert.deepEqual(emitted, [{ id: "w1", value: [2] }]);
    assert.equal(state.formPending, false);
    assert.deepEqual(state.committed, [2]);
  });

  test("toggling back to the committed value still flushes", () => {
    const { reconciler } = setup();
    reconciler.applyDescriptor(group("w1", { defaultIndices: [0] }));
    reconciler.click("w1", 1);
    reconciler.click("w1", 0);
    assert.deepEqual(reconciler.submitForm("f1"), [{ id: "w1", value: [0] }]);
  });

  test("a reshape drops a pending value that no longer fits back to the committed one", () => {
    const { reconciler, emitted, warnings } = setup();
    reconciler.applyDescriptor(group("w1", { defaultIndices: [1], value: [0], setValue: true }));
    reconciler.click("w1", 2);
    const narrower = group("w1", {
      options: [
        { content: "A", selectedContent: "" },
        { content: "B", selectedContent: "" },
      ],
      defaultIndices: [1],
    });
    const state = reconciler.applyDescriptor(narrower);
    assert.deepEqual(state.selection, [0]);
    assert.deepEqual(state.committed, [0]);
    assert.equal(state.formPending, false);
    assert.equal(state.phase, "INTERACTED");
    assert.deepEqual(emitted, []);
    assert.deepEqual(warnings, [
      '[rerun-ui][reconciler] widget "w1" changed shape (index 2 is out of range [0, 2)); selection reset to last committed value',
    ]);
  });
});
