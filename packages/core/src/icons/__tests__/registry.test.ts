import { assert, describe, test } from "@rerun-ui/testkit";
import { NotFoundError, RerunUiError } from "../../abi.js";
import { createIconRegistry, isIconKey, parseIconLabel } from "../registry.js";

describe("icon registry", () => {
  test("resolves registered icons", () => {
    const icons = createIconRegistry();
    icons.register("material/home", { kind: "text", text: "[home]" });
    assert.equal(icons.has("material/home"), true);
    assert.deepEqual(icons.resolve("material/home"), { kind: "text", text: "[home]" });
  });

  test("unknown keys throw NotFoundError carrying the key", () => {
    const icons = createIconRegistry();
    assert.throws(
      () => icons.resolve("material/missing"),
      (err: unknown) =>
        err instanceof NotFoundError &&
        err.code === "RRUI_NOT_FOUND" &&
        err.key === "material/missing" &&
        err.message === 'unknown icon "material/missing"',
    );
    assert.equal(icons.tryResolve("material/missing"), undefined);
  });

  test("keys are sorted", () => {
    const icons = createIconRegistry([
      ["set/zeta", { kind: "text", text: "z" }],
      ["set/alpha", { kind: "text", text: "a" }],
    ]);
    assert.deepEqual(icons.keys(), ["set/alpha", "set/zeta"]);
  });

  test("rejects malformed keys", () => {
    const icons = createIconRegistry();
    for (const key of ["star", "Material/star", "material/", "/star", "material/star/extra"]) {
      assert.throws(
        () => icons.register(key, { kind: "text", text: "x" }),
        (err: unknown) => err instanceof RerunUiError && err.code === "RRUI_INVALID_PROPS",
        key,
      );
    }
  });

  test("a frozen registry rejects registration", () => {
    const icons = createIconRegistry();
    icons.freeze();
    assert.equal(icons.frozen, true);
    assert.throws(
      () => icons.register("material/star", { kind: "text", text: "*" }),
      (err: unknown) => err instanceof RerunUiError && err.code === "RRUI_INVALID_STATE",
    );
  });

  test("stored variants are frozen copies", () => {
    const variant = { kind: "glyph" as const, glyph: "★", fallback: "*" };
    const icons = createIconRegistry([["material/star", variant]]);
    const stored = icons.resolve("material/star");
    assert.notEqual(stored, variant);
    assert.ok(Object.isFrozen(stored));
  });
});

describe("parseIconLabel", () => {
  test("splits a leading token", () => {
    assert.deepEqual(parseIconLabel(":material/star: Rate"), { iconKey: "material/star", text: "Rate" });
  });

  test("a bare token leaves empty text", () => {
    assert.deepEqual(parseIconLabel(":material/star:"), { iconKey: "material/star", text: "" });
  });

  test("tokens must be followed by whitespace or the end", () => {
    assert.deepEqual(parseIconLabel(":material/star:Rate"), { iconKey: null, text: ":material/star:Rate" });
  });

  test("only a leading token counts", () => {
    assert.deepEqual(parseIconLabel("Rate :material/star:"), { iconKey: null, text: "Rate :material/star:" });
  });

  test("isIconKey matches the registry key shape", () => {
    assert.equal(isIconKey("material/thumb_up"), true);
    assert.equal(isIconKey("material/Thumb"), false);
  });
});
