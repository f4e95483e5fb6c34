import { Types } from "mongoose";
import { serializeDocument } from "./mongoDocumentStore";

describe("serializeDocument", () => {
  it("exposes _id as a hex string id", () => {
    const _id = new Types.ObjectId("65a1f0c2e4b0a1b2c3d4e5f6");

    expect(serializeDocument({ _id, title: "Quiz" })).toEqual({
      title: "Quiz",
      id: "65a1f0c2e4b0a1b2c3d4e5f6",
    });
  });

  it("converts ObjectIds at the top level and inside arrays", () => {
    const ref = new Types.ObjectId("65a1f0c2e4b0a1b2c3d4e5f7");

    const doc = serializeDocument({
      _id: new Types.ObjectId("65a1f0c2e4b0a1b2c3d4e5f6"),
      owner: ref,
      related: [ref, "plain"],
    });

    expect(doc.owner).toBe("65a1f0c2e4b0a1b2c3d4e5f7");
    expect(doc.related).toEqual(["65a1f0c2e4b0a1b2c3d4e5f7", "plain"]);
  });

  it("leaves nested objects untouched", () => {
    const doc = serializeDocument({ _id: "abc", answers: [{ question_index: 0, answer: 1 }] });

    expect(doc).toEqual({ answers: [{ question_index: 0, answer: 1 }], id: "abc" });
  });
});
