import { describe, it, expect, vi } from "vitest";
import { extractVideoId, isValidVideoUrl, videoUrl, YoutubeSearchClient } from "./youtube";
import { HttpError, ProviderRateLimitError } from "./errors";

describe("extractVideoId", () => {
  it("reads ids from the common URL shapes", () => {
    expect(extractVideoId("https://www.youtube.com/watch?v=ByXuk9QqQkk")).toBe("ByXuk9QqQkk");
    expect(extractVideoId("https://youtu.be/ByXuk9QqQkk?t=3")).toBe("ByXuk9QqQkk");
    expect(extractVideoId("https://www.youtube.com/embed/ByXuk9QqQkk")).toBe("ByXuk9QqQkk");
    expect(extractVideoId("https://www.youtube.com/videos/ByXuk9QqQkk")).toBe("ByXuk9QqQkk");
  });

  it("returns null for anything else", () => {
    expect(extractVideoId("not-a-url")).toBeNull();
    expect(extractVideoId("https://www.youtube.com/watch?v=short")).toBeNull();
    expect(extractVideoId(null)).toBeNull();
    expect(extractVideoId("")).toBeNull();
  });
});

describe("isValidVideoUrl", () => {
  it("accepts only URLs carrying a video id", () => {
    expect(isValidVideoUrl(videoUrl("ByXuk9QqQkk"))).toBe(true);
    expect(isValidVideoUrl("https://example.com/trailer")).toBe(false);
  });
});

const searchBody = {
  items: [
    { id: { videoId: "aaaaaaaaaaa" }, snippet: { title: "Reaction video" } },
    { id: { videoId: "bbbbbbbbbbb" }, snippet: { title: "Spirited Away - Official Trailer" } },
  ],
};

describe("YoutubeSearchClient", () => {
  it("returns the first result for a loose search", async () => {
    const fetcher = vi.fn().mockResolvedValue(searchBody);
    const client = new YoutubeSearchClient("test-key", undefined, fetcher);
    expect(await client.searchFirstMatch("Spirited Away trailer", false)).toBe("aaaaaaaaaaa");
    const url = new URL(fetcher.mock.calls[0][0]);
    expect(url.searchParams.get("q")).toBe("Spirited Away trailer");
    expect(url.searchParams.get("key")).toBe("test-key");
  });

  it("requires the result title to contain the query for an exact search", async () => {
    const fetcher = vi.fn().mockResolvedValue(searchBody);
    const client = new YoutubeSearchClient("test-key", undefined, fetcher);
    expect(await client.searchExact("Spirited Away")).toBe("bbbbbbbbbbb");
    expect(await client.searchExact("Princess Mononoke")).toBeNull();
  });

  it("retries transient failures up to the limit", async () => {
    const fetcher = vi
      .fn()
      .mockRejectedValueOnce(new Error("fetch failed"))
      .mockResolvedValueOnce(searchBody);
    const client = new YoutubeSearchClient("test-key", undefined, fetcher);
    expect(await client.searchFirstMatch("Up trailer", false, 3)).toBe("aaaaaaaaaaa");
    expect(fetcher).toHaveBeenCalledTimes(2);
  });

  it("throws the last error once retries run out", async () => {
    const fetcher = vi.fn().mockRejectedValue(new Error("fetch failed"));
    const client = new YoutubeSearchClient("test-key", undefined, fetcher);
    await expect(client.searchFirstMatch("Up trailer", false, 2)).rejects.toThrow("fetch failed");
    expect(fetcher).toHaveBeenCalledTimes(2);
  });

  it("turns quota errors into a rate-limit error without retrying", async () => {
    const fetcher = vi.fn().mockRejectedValue(new HttpError(403, "Forbidden"));
    const client = new YoutubeSearchClient("test-key", undefined, fetcher);
    await expect(client.searchFirstMatch("Up trailer", false, 3)).rejects.toBeInstanceOf(
      ProviderRateLimitError,
    );
    expect(fetcher).toHaveBeenCalledTimes(1);
  });

  it("passes through its limiter", async () => {
    const acquire = vi.fn(async () => {});
    const fetcher = vi.fn().mockResolvedValue({ items: [] });
    const client = new YoutubeSearchClient("test-key", { acquire }, fetcher);
    expect(await client.searchFirstMatch("Up trailer", false)).toBeNull();
    expect(acquire).toHaveBeenCalledTimes(1);
  });
});
