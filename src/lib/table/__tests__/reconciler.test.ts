import { joinOnKeys, mergeWithFill, TableReconciler } from "../reconciler";
import { createTable } from "../table";

describe("mergeWithFill", () => {
  const left = createTable(
    ["id", "date", "views", "likes"],
    [
      { id: "v1", date: "2024-01-01", views: 10, likes: null },
      { id: "v2", date: "2024-01-01", views: null, likes: 3 },
    ]
  );
  const right = createTable(
    ["id", "date", "views", "shares"],
    [
      { id: "v2", date: "2024-01-01", views: 5, shares: 1 },
      { id: "v1", date: "2024-01-01", views: 99, shares: 2 },
      { id: "v3", date: "2024-01-02", views: 7, shares: 0 },
    ]
  );

  it("fills only null cells and never overwrites earlier values", () => {
    const result = mergeWithFill(left, right, ["id", "date"]);
    if (!result.ok) throw new Error(result.reason);

    expect(result.table.columns).toEqual(["id", "date", "views", "likes", "shares"]);
    expect(result.table.rows).toEqual([
      { id: "v1", date: "2024-01-01", views: 10, likes: null, shares: 2 },
      { id: "v2", date: "2024-01-01", views: 5, likes: 3, shares: 1 },
      { id: "v3", date: "2024-01-02", views: 7, likes: null, shares: 0 },
    ]);
  });

  it("reports missing key columns instead of merging", () => {
    const noDate = createTable(["id", "views"], [{ id: "v1", views: 1 }]);
    expect(mergeWithFill(left, noDate, ["id", "date"])).toEqual({
      ok: false,
      reason: "merge keys missing: date",
    });
  });
});

describe("joinOnKeys", () => {
  const left = createTable(["pos", "a"], [{ pos: 0, a: 1 }, { pos: 1, a: 2 }]);
  const right = createTable(["pos", "b"], [{ pos: 1, b: "x" }, { pos: 2, b: "y" }]);

  it("inner keeps only matched keys", () => {
    const result = joinOnKeys(left, right, ["pos"], "inner");
    if (!result.ok) throw new Error(result.reason);
    expect(result.table.rows).toEqual([{ pos: 1, a: 2, b: "x" }]);
  });

  it("left keeps unmatched left rows with null right columns", () => {
    const result = joinOnKeys(left, right, ["pos"], "left");
    if (!result.ok) throw new Error(result.reason);
    expect(result.table.rows).toEqual([
      { pos: 0, a: 1, b: null },
      { pos: 1, a: 2, b: "x" },
    ]);
  });
});

describe("TableReconciler", () => {
  it("concatenates and tags each source, dropping exact duplicates at the end", () => {
    const reconciler = new TableReconciler({ kind: "concatenate", tagColumn: "source" });
    const batch = createTable(["id", "views"], [{ id: "v1", views: 1 }, { id: "v1", views: 1 }]);
    reconciler.add(batch, "a.json");
    reconciler.add(createTable(["id", "likes"], [{ id: "v2", likes: 4 }]), "b.json");

    const table = reconciler.result();
    expect(table.columns).toEqual(["id", "views", "source", "likes"]);
    expect(table.rows).toEqual([
      { id: "v1", views: 1, source: "a.json", likes: null },
      { id: "v2", views: null, source: "b.json", likes: 4 },
    ]);
    expect(reconciler.count).toBe(2);
  });

  it("keeps the earliest value across several sources and skips sources without keys", () => {
    const reconciler = new TableReconciler({ kind: "merge-fill", keys: ["id"] });
    expect(reconciler.add(createTable(["id", "views"], [{ id: "v1", views: null }]), "first")).toBeNull();
    expect(reconciler.add(createTable(["views"], [{ views: 100 }]), "keyless")).toBe(
      "merge keys missing: id"
    );
    expect(reconciler.add(createTable(["id", "views"], [{ id: "v1", views: 5 }]), "second")).toBeNull();
    expect(reconciler.add(createTable(["id", "views"], [{ id: "v1", views: 8 }]), "third")).toBeNull();

    expect(reconciler.result().rows).toEqual([{ id: "v1", views: 5 }]);
    expect(reconciler.count).toBe(3);
  });

  it("returns an empty keyed table when nothing was merged", () => {
    const reconciler = new TableReconciler({ kind: "merge-fill", keys: ["id", "date"] });
    expect(reconciler.result()).toEqual({ columns: ["id", "date"], rows: [] });
  });
});
