import { describe, it, expect } from "vitest";
import { parseDownloadCommand } from "./command.js";

describe("parseDownloadCommand", () => {
  it("extracts and normalizes the channel link", () => {
    expect(parseDownloadCommand("download https://t.me/foo")).toEqual({
      rawText: "download https://t.me/foo",
      channelReference: "foo",
    });
  });

  it("accepts a bare channel name", () => {
    expect(parseDownloadCommand("download foo")?.channelReference).toBe("foo");
  });

  it("matches the keyword case-insensitively but keeps the argument's case", () => {
    expect(parseDownloadCommand("DownLoad t.me/FooBar")?.channelReference).toBe("FooBar");
  });

  it("tolerates surrounding whitespace", () => {
    expect(parseDownloadCommand("   download   t.me/foo   ")?.channelReference).toBe("foo");
  });

  it("ignores the keyword with nothing after it", () => {
    expect(parseDownloadCommand("download ")).toBeNull();
    expect(parseDownloadCommand("download")).toBeNull();
  });

  it("ignores a link that normalizes to nothing", () => {
    expect(parseDownloadCommand("download https://t.me/")).toBeNull();
  });

  it("ignores other text", () => {
    expect(parseDownloadCommand("hello there")).toBeNull();
    expect(parseDownloadCommand("downloads foo")).toBeNull();
    expect(parseDownloadCommand("please download foo")).toBeNull();
  });

  it("ignores messages without text", () => {
    expect(parseDownloadCommand(undefined)).toBeNull();
    expect(parseDownloadCommand("")).toBeNull();
  });
});
