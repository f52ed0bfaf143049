import { describe, it, expect } from "vitest";
import {
  matchSshUrl,
  matchHttpsUrl,
  parseRemoteUrl,
  normalizeRemoteUrl,
  toBrowseUrl,
  isRemoteUrl,
  isFileUrl,
} from "../../src/lib/url-parser.js";

describe("matchSshUrl", () => {
  it("parses standard SSH URL", () => {
    expect(matchSshUrl("git@example.com:alice/proj.git")).toEqual({
      domain: "example.com",
      user: "alice",
      project: "proj",
    });
  });

  it("accepts hyphens, dots and underscores where allowed", () => {
    expect(matchSshUrl("git@git.my-host.io:team_a/my-app.git")).toEqual({
      domain: "git.my-host.io",
      user: "team_a",
      project: "my-app",
    });
  });

  it("requires the .git suffix", () => {
    expect(matchSshUrl("git@example.com:alice/proj")).toBeNull();
  });

  it("rejects upper-case hosts", () => {
    expect(matchSshUrl("git@Example.com:alice/proj.git")).toBeNull();
  });

  it("rejects dots in the project name", () => {
    expect(matchSshUrl("git@example.com:alice/proj.v2.git")).toBeNull();
  });

  it("does not match HTTPS URLs", () => {
    expect(matchSshUrl("https://example.com/alice/proj.git")).toBeNull();
  });
});

describe("matchHttpsUrl", () => {
  it("parses standard HTTPS URL", () => {
    expect(matchHttpsUrl("https://example.com/bob/demo.git")).toEqual({
      domain: "example.com",
      user: "bob",
      project: "demo",
    });
  });

  it("drops a credential prefix", () => {
    expect(matchHttpsUrl("https://deploy-bot@example.com/bob/demo.git")).toEqual({
      domain: "example.com",
      user: "bob",
      project: "demo",
    });
  });

  it("rejects plain HTTP", () => {
    expect(matchHttpsUrl("http://example.com/bob/demo.git")).toBeNull();
  });

  it("rejects a port in the host", () => {
    expect(matchHttpsUrl("https://example.com:8443/bob/demo.git")).toBeNull();
  });

  it("rejects URLs without .git", () => {
    expect(matchHttpsUrl("https://example.com/bob/demo")).toBeNull();
  });
});

describe("normalizeRemoteUrl", () => {
  it("renders SSH remotes as https web pages", () => {
    expect(normalizeRemoteUrl("git@example.com:alice/proj.git")).toBe(
      "https://example.com/alice/proj"
    );
  });

  it("renders HTTPS remotes without credentials or suffix", () => {
    expect(normalizeRemoteUrl("https://deploy-bot@gitlab.example.org/team/tool.git")).toBe(
      "https://gitlab.example.org/team/tool"
    );
  });

  it("returns null for unrecognized URLs", () => {
    expect(normalizeRemoteUrl("ssh://git@example.com/alice/proj.git")).toBeNull();
    expect(normalizeRemoteUrl("/srv/git/proj.git")).toBeNull();
    expect(normalizeRemoteUrl("")).toBeNull();
  });

  it("keeps the domain/user/project triple stable through a round trip", () => {
    const parsed = parseRemoteUrl("git@example.com:alice/proj.git");
    expect(parsed).not.toBeNull();
    if (!parsed) return;

    expect(parseRemoteUrl(`${toBrowseUrl(parsed)}.git`)).toEqual(parsed);
  });
});

describe("isRemoteUrl", () => {
  it("returns true for SSH and HTTPS URLs", () => {
    expect(isRemoteUrl("git@example.com:alice/proj.git")).toBe(true);
    expect(isRemoteUrl("https://example.com/alice/proj.git")).toBe(true);
  });

  it("returns false for names and paths", () => {
    expect(isRemoteUrl("demo")).toBe(false);
    expect(isRemoteUrl("file:///srv/git/proj")).toBe(false);
  });
});

describe("isFileUrl", () => {
  it("detects the file:// prefix", () => {
    expect(isFileUrl("file:///srv/git/proj")).toBe(true);
    expect(isFileUrl("/srv/git/proj")).toBe(false);
  });
});
