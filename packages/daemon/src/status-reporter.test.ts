import { describe, it, expect } from "vitest";
import { COMPLETION_MARKER, reportCompletion } from "./status-reporter.js";
import { FakeAdapter, selfMessage } from "./testing/fake-adapter.js";

describe("reportCompletion", () => {
  it("edits the trigger message to the completion marker", async () => {
    const adapter = new FakeAdapter();

    const ok = await reportCompletion(adapter, selfMessage("download foo", { id: "42", chatId: "9" }));

    expect(ok).toBe(true);
    expect(adapter.edits).toEqual([{ chatId: "9", messageId: "42", text: COMPLETION_MARKER }]);
    expect(COMPLETION_MARKER).toBe("finished");
  });

  it("swallows a failed edit without retrying", async () => {
    const adapter = new FakeAdapter();
    adapter.editFailure = "result";

    await expect(reportCompletion(adapter, selfMessage("download foo"))).resolves.toBe(false);
    expect(adapter.edits).toHaveLength(1);
  });

  it("swallows a thrown edit error without retrying", async () => {
    const adapter = new FakeAdapter();
    adapter.editFailure = "throw";

    await expect(reportCompletion(adapter, selfMessage("download foo"))).resolves.toBe(false);
    expect(adapter.edits).toHaveLength(1);
  });
});
