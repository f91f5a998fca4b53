import { describe, it, expect } from "vitest";

import { fingerprint } from "../src/privacy/fingerprint";

const EMPTY_SHA256 = "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855";
const ABC_SHA256 = "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad";

describe("fingerprint", () => {
  it("hashes the empty string to the standard digest when unsalted", () => {
    expect(fingerprint("", "")).toEqual({ sha256_hex: EMPTY_SHA256, length: 0 });
  });

  it("treats null and undefined as the empty string", () => {
    expect(fingerprint(null, "")).toEqual(fingerprint("", ""));
    expect(fingerprint(undefined, "test-salt")).toEqual(fingerprint("", "test-salt"));
  });

  it("hashes the salt followed by the text", () => {
    expect(fingerprint("bc", "a").sha256_hex).toBe(ABC_SHA256);
    expect(fingerprint("abc", "").sha256_hex).toBe(ABC_SHA256);
  });

  it("keeps a zero length with a stable hash for empty text under a salt", () => {
    const first = fingerprint("", "test-salt");
    const second = fingerprint("", "test-salt");
    expect(first.length).toBe(0);
    expect(first.sha256_hex).toBe(second.sha256_hex);
    expect(first.sha256_hex).not.toBe(EMPTY_SHA256);
  });

  it("does not trim or normalize input", () => {
    expect(fingerprint(" abc", "").sha256_hex).not.toBe(ABC_SHA256);
    expect(fingerprint(" abc", "").length).toBe(4);
  });

  it("counts code points rather than UTF-16 units", () => {
    expect(fingerprint("héllo", "").length).toBe(5);
    expect(fingerprint("😀a", "").length).toBe(2);
  });

  it("changes with the salt", () => {
    expect(fingerprint("same text", "salt-a").sha256_hex).not.toBe(fingerprint("same text", "salt-b").sha256_hex);
  });
});
