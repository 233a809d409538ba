import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { GroupStore } from "../../services/group-store";

const FIXED = new Date("2024-05-01T12:00:00.000Z");

describe("GroupStore", () => {
  let dir: string;
  let file: string;
  let store: GroupStore;

  beforeEach(() => {
    dir = path.join(tmpdir(), `dockhand-groups-${randomUUID()}`);
    file = path.join(dir, "groups.json");
    store = new GroupStore(file, () => FIXED);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("lists nothing when the file does not exist yet", async () => {
    const groups = await store.list();
    expect(groups._unsafeUnwrap()).toEqual([]);
  });

  it("creates groups with cycling colors and persists them in snake case", async () => {
    const first = (await store.create("  web-tier ", "frontends"))._unsafeUnwrap();
    const second = (await store.create("db"))._unsafeUnwrap();

    expect(first).toMatchObject({ name: "web-tier", description: "frontends", color: "blue", containerIds: [] });
    expect(first.created).toBe("2024-05-01T12:00:00.000Z");
    expect(second.color).toBe("green");

    const saved: unknown = JSON.parse(await fs.readFile(file, "utf8"));
    expect(saved).toMatchObject({
      version: "1.0",
      last_modified: "2024-05-01T12:00:00.000Z",
      groups: [
        { id: first.id, name: "web-tier", container_ids: [] },
        { id: second.id, name: "db", container_ids: [] },
      ],
    });
  });

  it("rejects a blank name", async () => {
    const result = await store.create("   ");
    expect(result._unsafeUnwrapErr()).toEqual({ kind: "invalid", message: "group name is required" });
  });

  it("keeps the previous file as a backup on every write", async () => {
    await store.create("first");
    await store.create("second");

    const backup: unknown = JSON.parse(await fs.readFile(`${file}.bak`, "utf8"));
    expect(backup).toMatchObject({ groups: [{ name: "first" }] });
    await expect(fs.access(`${file}.tmp`)).rejects.toThrow();
  });

  it("adds members once and removes them", async () => {
    const group = (await store.create("web-tier"))._unsafeUnwrap();

    await store.addMember(group.id, "c1");
    await store.addMember(group.id, "c1");
    const withTwo = (await store.addMember(group.id, "c2"))._unsafeUnwrap();
    expect(withTwo.containerIds).toEqual(["c1", "c2"]);

    const after = (await store.removeMember(group.id, "c1"))._unsafeUnwrap();
    expect(after.containerIds).toEqual(["c2"]);
  });

  it("serializes concurrent writers so no update is lost", async () => {
    const group = (await store.create("web-tier"))._unsafeUnwrap();
    const ids = ["a", "b", "c", "d", "e"];

    await Promise.all(ids.map((id) => store.addMember(group.id, id)));

    const stored = (await store.get(group.id))._unsafeUnwrap();
    expect([...stored.containerIds].sort()).toEqual(ids);
  });

  it("renames and recolors a group", async () => {
    const group = (await store.create("web-tier"))._unsafeUnwrap();
    const updated = (await store.update(group.id, { name: "edge", color: "red" }))._unsafeUnwrap();
    expect(updated).toMatchObject({ id: group.id, name: "edge", color: "red" });

    const blank = await store.update(group.id, { name: " " });
    expect(blank._unsafeUnwrapErr().kind).toBe("invalid");
  });

  it("swaps a replaced container id in every group that holds it", async () => {
    const a = (await store.create("a"))._unsafeUnwrap();
    const b = (await store.create("b"))._unsafeUnwrap();
    await store.addMember(a.id, "old");
    await store.addMember(b.id, "other");

    const changed = await store.replaceMember("old", "new");
    expect(changed._unsafeUnwrap()).toBe(1);
    expect((await store.get(a.id))._unsafeUnwrap().containerIds).toEqual(["new"]);
  });

  it("drops a deleted container from every group", async () => {
    const a = (await store.create("a"))._unsafeUnwrap();
    const b = (await store.create("b"))._unsafeUnwrap();
    await store.addMember(a.id, "gone");
    await store.addMember(b.id, "gone");

    expect((await store.removeFromAll("gone"))._unsafeUnwrap()).toBe(2);
    expect((await store.get(b.id))._unsafeUnwrap().containerIds).toEqual([]);
  });

  it("reports an unknown group as not found", async () => {
    const missing = await store.addMember("nope", "c1");
    expect(missing._unsafeUnwrapErr()).toEqual({ kind: "not_found", message: "group nope not found", id: "nope" });
    expect((await store.delete("nope"))._unsafeUnwrapErr().kind).toBe("not_found");
  });

  it("deletes a group", async () => {
    const group = (await store.create("web-tier"))._unsafeUnwrap();
    await store.delete(group.id);
    expect((await store.list())._unsafeUnwrap()).toEqual([]);
  });

  it("reports a corrupt file as invalid without overwriting it", async () => {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(file, "{not json");

    const result = await store.create("web-tier");
    expect(result._unsafeUnwrapErr().kind).toBe("invalid");
    expect(await fs.readFile(file, "utf8")).toBe("{not json");
  });

  it("reads files that store null member lists", async () => {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(
      file,
      JSON.stringify({
        version: "1.0",
        groups: [{ id: "g1", name: "legacy", container_ids: null, created: "x", modified: "x" }],
      }),
    );

    const groups = (await store.list())._unsafeUnwrap();
    expect(groups).toEqual([
      { id: "g1", name: "legacy", description: "", containerIds: [], created: "x", modified: "x", color: "blue" },
    ]);
  });
});
