import { describe, expect, it } from "vitest";
import { CommandFailedError, createTailBuffer } from "../../src/infrastructure/process/runCommand";

describe("command helpers", () => {
  it("keeps only the tail of long output", () => {
    const tail = createTailBuffer(8);
    tail.append(Buffer.from("0123456789"));
    tail.append(Buffer.from("ab"));
    expect(tail.value()).toBe("456789ab");
  });

  it("collapses stderr into the failure message", () => {
    const error = new CommandFailedError("ffmpeg", 1, "Invalid data\n  found");
    expect(error.message).toBe("ffmpeg failed (exit 1). Invalid data found");
    expect(new CommandFailedError("yt-dlp", null, "").message).toBe("yt-dlp failed (exit unknown).");
  });
});
