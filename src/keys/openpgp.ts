import crypto from "node:crypto";
import { DomainError } from "../types/errors";

export const ARMOR_BEGIN = "-----BEGIN PGP PUBLIC KEY BLOCK-----";
export const ARMOR_END = "-----END PGP PUBLIC KEY BLOCK-----";

const TAG_PUBLIC_KEY = 6;
const TAG_USER_ID = 13;

const ALGORITHM_NAMES: Record<number, string> = {
  1: "rsa",
  2: "rsa",
  3: "rsa",
  16: "elgamal",
  17: "dsa",
  18: "ecdh",
  19: "ecdsa",
  22: "eddsa",
};

const CURVES: Record<string, { name: string; bits: number }> = {
  "2b06010401da470f01": { name: "ed25519", bits: 256 },
  "2b060104019755010501": { name: "cv25519", bits: 256 },
  "2a8648ce3d030107": { name: "nistp256", bits: 256 },
  "2b81040022": { name: "nistp384", bits: 384 },
  "2b81040023": { name: "nistp521", bits: 521 },
};

export type ArmoredBlock = {
  index: number;
  text: string;
};

export type ParsedPublicKey = {
  fingerprint: string;
  keyId: string;
  algorithm: string;
  bits: number | null;
  createdAt: string;
  userIds: string[];
  primaryUid: string | null;
  foundationUid: string | null;
  armored: string;
};

type Packet = {
  tag: number;
  body: Buffer;
};

/**
 * Splits a key listing into armored public key blocks. Text between blocks is
 * ignored. An unterminated block ends at the next header line or at the end
 * of the input, so it still yields its own entry that later fails to parse.
 */
export function splitArmoredBlocks(text: string): ArmoredBlock[] {
  const lines = text.split(/\r?\n/);
  const blocks: ArmoredBlock[] = [];
  let current: string[] | null = null;

  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed === ARMOR_BEGIN) {
      if (current !== null) {
        blocks.push({ index: blocks.length, text: current.join("\n") });
      }
      current = [trimmed];
      continue;
    }
    if (current === null) continue;
    current.push(trimmed);
    if (trimmed === ARMOR_END) {
      blocks.push({ index: blocks.length, text: current.join("\n") });
      current = null;
    }
  }
  if (current !== null) {
    blocks.push({ index: blocks.length, text: current.join("\n") });
  }
  return blocks;
}

/** CRC-24 as used by the OpenPGP armor checksum line. */
export function crc24(data: Buffer): number {
  let crc = 0xb704ce;
  for (const byte of data) {
    crc ^= byte << 16;
    for (let i = 0; i < 8; i += 1) {
      crc <<= 1;
      if (crc & 0x1000000) crc ^= 0x1864cfb;
    }
  }
  return crc & 0xffffff;
}

export function armorChecksum(data: Buffer): string {
  const crc = crc24(data);
  return `=${Buffer.from([(crc >> 16) & 0xff, (crc >> 8) & 0xff, crc & 0xff]).toString("base64")}`;
}

function malformed(message: string): DomainError {
  return new DomainError("KEY_MALFORMED", message);
}

export function dearmor(armored: string): Buffer {
  const lines = armored.trim().split(/\r?\n/).map((line) => line.trim());
  if (lines[0] !== ARMOR_BEGIN) {
    throw malformed("missing armor header line");
  }
  const endIndex = lines.indexOf(ARMOR_END);
  if (endIndex < 0) {
    throw malformed("missing armor footer line");
  }

  let cursor = 1;
  while (cursor < endIndex && /^[A-Za-z][\w-]*:\s/.test(lines[cursor] ?? "")) {
    cursor += 1;
  }

  const bodyLines: string[] = [];
  let checksum: string | null = null;
  for (const line of lines.slice(cursor, endIndex)) {
    if (!line) continue;
    if (line.startsWith("=") && line.length === 5) {
      checksum = line;
      continue;
    }
    if (!/^[A-Za-z0-9+/]+={0,2}$/.test(line)) {
      throw malformed("armor body is not base64");
    }
    bodyLines.push(line);
  }

  const joined = bodyLines.join("");
  if (!joined || joined.length % 4 !== 0) {
    throw malformed("armor body has an invalid length");
  }
  const data = Buffer.from(joined, "base64");
  if (checksum !== null && armorChecksum(data) !== checksum) {
    throw malformed("armor checksum mismatch");
  }
  return data;
}

function readPackets(data: Buffer): Packet[] {
  const packets: Packet[] = [];
  let offset = 0;

  while (offset < data.length) {
    const header = data[offset] ?? 0;
    if ((header & 0x80) === 0) {
      throw malformed(`invalid packet header at offset ${offset}`);
    }
    offset += 1;

    let tag: number;
    let length: number;
    if (header & 0x40) {
      tag = header & 0x3f;
      const first = data[offset];
      if (first === undefined) throw malformed("truncated packet length");
      if (first < 192) {
        length = first;
        offset += 1;
      } else if (first < 224) {
        const second = data[offset + 1];
        if (second === undefined) throw malformed("truncated packet length");
        length = ((first - 192) << 8) + second + 192;
        offset += 2;
      } else if (first === 255) {
        if (offset + 5 > data.length) throw malformed("truncated packet length");
        length = data.readUInt32BE(offset + 1);
        offset += 5;
      } else {
        throw malformed("partial body lengths are not allowed in key material");
      }
    } else {
      tag = (header >> 2) & 0x0f;
      const lengthType = header & 0x03;
      if (lengthType === 3) {
        length = data.length - offset;
      } else {
        const width = lengthType === 0 ? 1 : lengthType === 1 ? 2 : 4;
        if (offset + width > data.length) throw malformed("truncated packet length");
        length = data.readUIntBE(offset, width);
        offset += width;
      }
    }

    if (offset + length > data.length) {
      throw malformed(`packet ${tag} overruns the key material`);
    }
    packets.push({ tag, body: data.subarray(offset, offset + length) });
    offset += length;
  }

  return packets;
}

function publicKeyDetails(body: Buffer): { algorithm: string; bits: number | null; createdAt: string } {
  if (body.length < 6) {
    throw malformed("public key packet is truncated");
  }
  const version = body[0];
  if (version !== 4) {
    throw new DomainError("KEY_UNSUPPORTED", `public key packet version ${String(version)} is not supported`);
  }
  const createdAt = new Date(body.readUInt32BE(1) * 1000).toISOString();
  const algorithmId = body[5] ?? 0;
  const algorithm = ALGORITHM_NAMES[algorithmId] ?? `alg-${algorithmId}`;

  let bits: number | null = null;
  if (algorithmId === 1 || algorithmId === 2 || algorithmId === 3 || algorithmId === 16 || algorithmId === 17) {
    bits = body.length >= 8 ? body.readUInt16BE(6) : null;
  } else if (algorithmId === 18 || algorithmId === 19 || algorithmId === 22) {
    const oidLength = body[6] ?? 0;
    const oid = body.subarray(7, 7 + oidLength).toString("hex");
    bits = CURVES[oid]?.bits ?? null;
  }
  return { algorithm, bits, createdAt };
}

export function v4Fingerprint(publicKeyBody: Buffer): string {
  const prefix = Buffer.from([0x99, (publicKeyBody.length >> 8) & 0xff, publicKeyBody.length & 0xff]);
  return crypto.createHash("sha1").update(prefix).update(publicKeyBody).digest("hex").toUpperCase();
}

export function foundationUidFrom(userIds: string[], emailDomain: string): string | null {
  const suffix = `@${emailDomain.toLowerCase()}`;
  for (const userId of userIds) {
    const match = userId.match(/<([^<>\s]+)>/);
    const address = (match?.[1] ?? "").toLowerCase();
    if (address.endsWith(suffix) && address.length > suffix.length) {
      return address.slice(0, -suffix.length);
    }
  }
  return null;
}

export function parsePublicKey(armored: string, options: { foundationEmailDomain: string }): ParsedPublicKey {
  const packets = readPackets(dearmor(armored));
  const primary = packets[0];
  if (!primary || primary.tag !== TAG_PUBLIC_KEY) {
    throw malformed("key material does not start with a public key packet");
  }

  const details = publicKeyDetails(primary.body);
  const fingerprint = v4Fingerprint(primary.body);
  const userIds = packets.filter((packet) => packet.tag === TAG_USER_ID).map((packet) => packet.body.toString("utf8"));

  return {
    fingerprint,
    keyId: fingerprint.slice(-16),
    algorithm: details.algorithm,
    bits: details.bits,
    createdAt: details.createdAt,
    userIds,
    primaryUid: userIds[0] ?? null,
    foundationUid: foundationUidFrom(userIds, options.foundationEmailDomain),
    armored: armored.trim(),
  };
}

export function normalizeFingerprint(value: string): string | null {
  const compact = value.replace(/\s+/g, "").toUpperCase();
  return /^[0-9A-F]{40}$/.test(compact) ? compact : null;
}
