import { MemoryDocumentStore } from "./memoryDocumentStore";

describe("MemoryDocumentStore", () => {
  let store: MemoryDocumentStore;

  beforeEach(() => {
    store = new MemoryDocumentStore();
  });

  it("round-trips a document by id", async () => {
    const id = await store.createDocument("lesson", { title: "Fractions" });

    expect(await store.findById("lesson", id)).toEqual({ title: "Fractions", id });
  });

  it("copies data on write so later caller edits do not leak in", async () => {
    const data = { answers: [{ question_index: 0, answer: "a" }] };
    const id = await store.createDocument("submission", data);

    data.answers.push({ question_index: 1, answer: "b" });

    expect(await store.findById("submission", id)).toEqual({
      answers: [{ question_index: 0, answer: "a" }],
      id,
    });
  });

  it("returns null for unknown ids and collections", async () => {
    expect(await store.findById("lesson", "nope")).toBeNull();
  });

  it("lists documents per collection", async () => {
    await store.createDocument("lesson", { title: "A" });
    await store.createDocument("assessment", { title: "B" });

    const lessons = await store.getDocuments("lesson");

    expect(lessons.map((l) => l.title)).toEqual(["A"]);
    expect(await store.getDocuments("submission")).toEqual([]);
  });

  it("merges updates and reports missing documents", async () => {
    const id = await store.createDocument("submission", { graded: false });

    expect(await store.updateById("submission", id, { graded: true })).toBe(true);
    expect(await store.findById("submission", id)).toEqual({ graded: true, id });
    expect(await store.updateById("submission", "missing", { graded: true })).toBe(false);
  });

  it("reports the collections it holds", async () => {
    await store.createDocument("lesson", { title: "A" });

    expect(await store.status()).toEqual({ connected: true, collections: ["lesson"] });
  });
});
