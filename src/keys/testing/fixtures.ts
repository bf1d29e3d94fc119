import { ARMOR_BEGIN, ARMOR_END, armorChecksum, v4Fingerprint } from "../openpgp";

const ED25519_OID = Buffer.from("2b06010401da470f01", "hex");

export type KeyFixture = {
  armored: string;
  fingerprint: string;
  body: Buffer;
};

function uint32(value: number): Buffer {
  const buffer = Buffer.alloc(4);
  buffer.writeUInt32BE(value);
  return buffer;
}

export function ed25519KeyBody(seed: number, createdSeconds = 1_700_000_000, version = 4): Buffer {
  return Buffer.concat([
    Buffer.from([version]),
    uint32(createdSeconds),
    Buffer.from([22, ED25519_OID.length]),
    ED25519_OID,
    Buffer.from([0x01, 0x07, 0x40]),
    Buffer.alloc(32, seed),
  ]);
}

export function rsaKeyBody(seed: number, bits: number, createdSeconds = 1_700_000_000): Buffer {
  const modulusBytes = Math.ceil(bits / 8);
  return Buffer.concat([
    Buffer.from([4]),
    uint32(createdSeconds),
    Buffer.from([1, (bits >> 8) & 0xff, bits & 0xff]),
    Buffer.alloc(modulusBytes, seed | 0x80),
    Buffer.from([0x00, 0x11, 0x01, 0x00, 0x01]),
  ]);
}

/** New-format packet with a one- or two-octet length. */
export function packet(tag: number, body: Buffer): Buffer {
  if (body.length < 192) {
    return Buffer.concat([Buffer.from([0xc0 | tag, body.length]), body]);
  }
  const adjusted = body.length - 192;
  return Buffer.concat([Buffer.from([0xc0 | tag, (adjusted >> 8) + 192, adjusted & 0xff]), body]);
}

export function armor(data: Buffer, headers: string[] = []): string {
  const encoded = data.toString("base64");
  const lines: string[] = [];
  for (let offset = 0; offset < encoded.length; offset += 64) {
    lines.push(encoded.slice(offset, offset + 64));
  }
  return [ARMOR_BEGIN, ...headers, "", ...lines, armorChecksum(data), ARMOR_END].join("\n");
}

export function buildKeyFixture(input: { seed: number; userIds?: string[]; body?: Buffer }): KeyFixture {
  const body = input.body ?? ed25519KeyBody(input.seed);
  const data = Buffer.concat([
    packet(6, body),
    ...(input.userIds ?? []).map((userId) => packet(13, Buffer.from(userId, "utf8"))),
  ]);
  return { armored: armor(data), fingerprint: v4Fingerprint(body), body };
}

export function keysFileText(fixtures: Array<KeyFixture | string>): string {
  return fixtures
    .map((entry) => (typeof entry === "string" ? entry : `pub   ed25519 ${entry.fingerprint}\n${entry.armored}`))
    .join("\n\n");
}
