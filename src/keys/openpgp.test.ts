import test from "node:test";
import assert from "node:assert/strict";
import crypto from "node:crypto";
import { isDomainError } from "../types/errors";
import { armorChecksum, dearmor, normalizeFingerprint, parsePublicKey, splitArmoredBlocks } from "./openpgp";
import { armor, buildKeyFixture, ed25519KeyBody, packet, rsaKeyBody } from "./testing/fixtures";

const options = { foundationEmailDomain: "apache.org" };

test("parsePublicKey computes the v4 fingerprint over the public key packet", () => {
  const fixture = buildKeyFixture({ seed: 7, userIds: ["Alice Example <alice@apache.org>"] });
  const expected = crypto
    .createHash("sha1")
    .update(Buffer.concat([Buffer.from([0x99, 0x00, fixture.body.length]), fixture.body]))
    .digest("hex")
    .toUpperCase();

  const parsed = parsePublicKey(fixture.armored, options);

  assert.equal(fixture.body.length, 51);
  assert.equal(parsed.fingerprint, expected);
  assert.equal(parsed.keyId, expected.slice(-16));
  assert.equal(parsed.algorithm, "eddsa");
  assert.equal(parsed.bits, 256);
  assert.equal(parsed.createdAt, "2023-11-14T22:13:20.000Z");
  assert.deepEqual(parsed.userIds, ["Alice Example <alice@apache.org>"]);
  assert.equal(parsed.primaryUid, "Alice Example <alice@apache.org>");
  assert.equal(parsed.foundationUid, "alice");
});

test("parsePublicKey reads the RSA modulus size", () => {
  const fixture = buildKeyFixture({ seed: 3, body: rsaKeyBody(3, 4096) });
  const parsed = parsePublicKey(fixture.armored, options);
  assert.equal(parsed.algorithm, "rsa");
  assert.equal(parsed.bits, 4096);
});

test("parsePublicKey only takes a foundation uid from the configured domain", () => {
  const fixture = buildKeyFixture({
    seed: 9,
    userIds: ["Bob <bob@example.com>", "Bob Builder <bob@apache.org>"],
  });
  assert.equal(parsePublicKey(fixture.armored, options).foundationUid, "bob");
  assert.equal(parsePublicKey(fixture.armored, { foundationEmailDomain: "example.net" }).foundationUid, null);
});

test("dearmor skips armor headers", () => {
  const data = packet(6, ed25519KeyBody(1));
  const armored = armor(data, ["Comment: uploaded for testing", "Version: 1"]);
  assert.deepEqual(dearmor(armored), data);
});

test("dearmor rejects a checksum mismatch", () => {
  const fixture = buildKeyFixture({ seed: 2 });
  const lines = fixture.armored.split("\n");
  lines[lines.length - 2] = armorChecksum(Buffer.from("different content"));
  assert.throws(
    () => dearmor(lines.join("\n")),
    (error: unknown) => isDomainError(error, "KEY_MALFORMED") && error.message === "armor checksum mismatch"
  );
});

test("parsePublicKey rejects material that does not start with a key packet", () => {
  const armored = armor(packet(13, Buffer.from("Someone <someone@apache.org>")));
  assert.throws(() => parsePublicKey(armored, options), (error: unknown) => isDomainError(error, "KEY_MALFORMED"));
});

test("parsePublicKey reports newer key versions as unsupported", () => {
  const fixture = buildKeyFixture({ seed: 4, body: ed25519KeyBody(4, 1_700_000_000, 5) });
  assert.throws(() => parsePublicKey(fixture.armored, options), (error: unknown) => isDomainError(error, "KEY_UNSUPPORTED"));
});

test("splitArmoredBlocks ignores text around blocks and keeps an unterminated tail", () => {
  const first = buildKeyFixture({ seed: 11 });
  const second = buildKeyFixture({ seed: 12 });
  const text = [
    "This file contains the public keys used to sign releases.",
    "pub   ed25519 2023-11-14",
    first.armored,
    "",
    second.armored,
    "-----BEGIN PGP PUBLIC KEY BLOCK-----",
    "",
    "bm90IGEga2V5",
  ].join("\n");

  const blocks = splitArmoredBlocks(text);

  assert.equal(blocks.length, 3);
  assert.equal(blocks[0]?.text, first.armored);
  assert.equal(blocks[1]?.text, second.armored);
  assert.equal(blocks[2]?.index, 2);
  assert.throws(
    () => dearmor(blocks[2]?.text ?? ""),
    (error: unknown) => isDomainError(error, "KEY_MALFORMED") && error.message === "missing armor footer line"
  );
});

test("splitArmoredBlocks closes an unterminated block at the next header line", () => {
  const valid = buildKeyFixture({ seed: 13 });
  const text = ["-----BEGIN PGP PUBLIC KEY BLOCK-----", "AAAA", valid.armored].join("\n");

  const blocks = splitArmoredBlocks(text);

  assert.equal(blocks.length, 2);
  assert.equal(blocks[0]?.text, "-----BEGIN PGP PUBLIC KEY BLOCK-----\nAAAA");
  assert.throws(
    () => dearmor(blocks[0]?.text ?? ""),
    (error: unknown) => isDomainError(error, "KEY_MALFORMED") && error.message === "missing armor footer line"
  );
  assert.equal(blocks[1]?.index, 1);
  assert.equal(blocks[1]?.text, valid.armored);
  assert.equal(parsePublicKey(blocks[1]?.text ?? "", options).fingerprint, valid.fingerprint);
});

test("normalizeFingerprint accepts spaced and lower-case input", () => {
  assert.equal(
    normalizeFingerprint("0123 4567 89ab cdef 0123  4567 89AB CDEF 0123 4567"),
    "0123456789ABCDEF0123456789ABCDEF01234567"
  );
  assert.equal(normalizeFingerprint("0123"), null);
});
