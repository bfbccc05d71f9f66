/**
 * Single-entry zip archive (stored, no compression), the shape of an
 * export download.
 */

const CRC_TABLE = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
})();

export function crc32(bytes: Uint8Array): number {
  let crc = 0xffffffff;
  for (const byte of bytes) {
    crc = CRC_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

export function zipSingleFile(name: string, contents: string): ArrayBuffer {
  const encoder = new TextEncoder();
  const fileName = encoder.encode(name);
  const body = encoder.encode(contents);
  const checksum = crc32(body);

  const local = new DataView(new ArrayBuffer(30));
  local.setUint32(0, 0x04034b50, true);
  local.setUint16(4, 20, true);
  local.setUint32(14, checksum, true);
  local.setUint32(18, body.length, true);
  local.setUint32(22, body.length, true);
  local.setUint16(26, fileName.length, true);

  const central = new DataView(new ArrayBuffer(46));
  central.setUint32(0, 0x02014b50, true);
  central.setUint16(4, 20, true);
  central.setUint16(6, 20, true);
  central.setUint32(16, checksum, true);
  central.setUint32(20, body.length, true);
  central.setUint32(24, body.length, true);
  central.setUint16(28, fileName.length, true);

  const centralOffset = 30 + fileName.length + body.length;
  const centralSize = 46 + fileName.length;

  const end = new DataView(new ArrayBuffer(22));
  end.setUint32(0, 0x06054b50, true);
  end.setUint16(8, 1, true);
  end.setUint16(10, 1, true);
  end.setUint32(12, centralSize, true);
  end.setUint32(16, centralOffset, true);

  const parts = [
    new Uint8Array(local.buffer),
    fileName,
    body,
    new Uint8Array(central.buffer),
    fileName,
    new Uint8Array(end.buffer),
  ];
  const buffer = new ArrayBuffer(parts.reduce((size, part) => size + part.length, 0));
  const archive = new Uint8Array(buffer);
  let offset = 0;
  for (const part of parts) {
    archive.set(part, offset);
    offset += part.length;
  }
  return buffer;
}
