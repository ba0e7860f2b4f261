import type {
  ContainerDocument,
  ContainerLayout,
  ContainerObjectName,
  ContainerObjectRecord,
  EncodedImage,
} from "../shared/contracts.js";
import { invalidInput } from "./errors.js";

export const PDF_HEADER = "%PDF-1.4\n";
// Binary comment so transfer tools treat the file as binary.
const BINARY_MARKER = new Uint8Array([0x25, 0xe2, 0xe3, 0xcf, 0xd3, 0x0a]);

export const OBJECT_IDS: Record<ContainerObjectName, number> = {
  catalog: 1,
  pages: 2,
  page: 3,
  image: 4,
  content: 5,
};

const OBJECT_ORDER: ContainerObjectName[] = ["catalog", "pages", "page", "image", "content"];
const XREF_SIZE = OBJECT_ORDER.length + 1;
const IMAGE_RESOURCE = "Im0";

const encoder = new TextEncoder();

/** Append-only byte sink whose `length` is always the true size of everything written. */
export class ByteWriter {
  private chunks: Uint8Array[] = [];
  private size = 0;

  get length(): number {
    return this.size;
  }

  writeAscii(text: string): this {
    return this.writeBytes(encoder.encode(text));
  }

  writeBytes(bytes: Uint8Array): this {
    this.chunks.push(bytes);
    this.size += bytes.byteLength;
    return this;
  }

  toBytes(): Uint8Array {
    const out = new Uint8Array(this.size);
    let cursor = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, cursor);
      cursor += chunk.byteLength;
    }
    return out;
  }
}

const ref = (name: ContainerObjectName): string => `${OBJECT_IDS[name]} 0 R`;

export const buildContentProgram = (width: number, height: number): string =>
  ["q", `${width} 0 0 ${height} 0 0 cm`, `/${IMAGE_RESOURCE} Do`, "Q"].join("\n");

const formatXrefEntry = (offset: number): string =>
  `${String(offset).padStart(10, "0")} 00000 n \n`;

const isPositiveInteger = (value: number): boolean => Number.isInteger(value) && value > 0;

/**
 * Build a single-page PDF whose only content is `image` drawn over the full page.
 * The JPEG bytes are embedded verbatim under /DCTDecode; page units are pixels.
 */
export const assembleContainer = (image: EncodedImage): ContainerDocument => {
  if (image.codec !== "jpeg") {
    throw invalidInput(`Container embedding requires JPEG bytes, received ${image.codec}`);
  }
  if (!isPositiveInteger(image.width) || !isPositiveInteger(image.height)) {
    throw invalidInput(`Invalid image dimensions ${image.width}x${image.height}`);
  }
  if (image.bytes.byteLength === 0) {
    throw invalidInput("Encoded image is empty");
  }

  const { width, height } = image;
  const writer = new ByteWriter();
  const objects: ContainerObjectRecord[] = [];

  const beginObject = (name: ContainerObjectName): void => {
    objects.push({ id: OBJECT_IDS[name], name, offset: writer.length });
    writer.writeAscii(`${OBJECT_IDS[name]} 0 obj\n`);
  };
  const endObject = (): void => {
    writer.writeAscii("endobj\n");
  };

  writer.writeAscii(PDF_HEADER).writeBytes(BINARY_MARKER);

  beginObject("catalog");
  writer.writeAscii(`<< /Type /Catalog /Pages ${ref("pages")} >>\n`);
  endObject();

  beginObject("pages");
  writer.writeAscii(`<< /Type /Pages /Kids [${ref("page")}] /Count 1 >>\n`);
  endObject();

  beginObject("page");
  writer.writeAscii(
    `<< /Type /Page /Parent ${ref("pages")} /MediaBox [0 0 ${width} ${height}] ` +
      `/Resources << /XObject << /${IMAGE_RESOURCE} ${ref("image")} >> >> ` +
      `/Contents ${ref("content")} >>\n`
  );
  endObject();

  beginObject("image");
  writer.writeAscii(
    `<< /Type /XObject /Subtype /Image /Width ${width} /Height ${height} ` +
      `/ColorSpace /DeviceRGB /BitsPerComponent 8 /Filter /DCTDecode ` +
      `/Length ${image.bytes.byteLength} >>\n`
  );
  writer.writeAscii("stream\n").writeBytes(image.bytes).writeAscii("\nendstream\n");
  endObject();

  const program = encoder.encode(buildContentProgram(width, height));
  beginObject("content");
  writer.writeAscii(`<< /Length ${program.byteLength} >>\n`);
  writer.writeAscii("stream\n").writeBytes(program).writeAscii("\nendstream\n");
  endObject();

  const xrefOffset = writer.length;
  writer.writeAscii(`xref\n0 ${XREF_SIZE}\n`);
  writer.writeAscii("0000000000 65535 f \n");
  for (const record of objects) {
    writer.writeAscii(formatXrefEntry(record.offset));
  }

  writer.writeAscii(`trailer\n<< /Size ${XREF_SIZE} /Root ${ref("catalog")} >>\n`);
  writer.writeAscii(`startxref\n${xrefOffset}\n%%EOF\n`);

  return { bytes: writer.toBytes(), objects, xrefOffset };
};

/**
 * Read back the cross-reference table of a container produced by `assembleContainer`.
 * Only the classic single-section xref layout is understood.
 */
export const readContainerLayout = (bytes: Uint8Array): ContainerLayout => {
  // latin1 keeps one character per byte, so string indices are byte offsets.
  const text = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("latin1");
  const header = text.slice(0, PDF_HEADER.length);
  if (header !== PDF_HEADER) {
    throw invalidInput("Container is missing the PDF header");
  }

  const startxref = /startxref\n(\d+)\n%%EOF\n?$/.exec(text);
  if (!startxref) {
    throw invalidInput("Container has no startxref footer");
  }
  const xrefOffset = Number.parseInt(startxref[1], 10);

  const xrefSection = /^xref\n0 (\d+)\n/.exec(text.slice(xrefOffset));
  if (!xrefSection) {
    throw invalidInput(`No xref section at offset ${xrefOffset}`);
  }
  const size = Number.parseInt(xrefSection[1], 10);
  const entriesStart = xrefOffset + xrefSection[0].length;

  const offsets: number[] = [];
  for (let index = 0; index < size; index++) {
    const entry = text.slice(entriesStart + index * 20, entriesStart + (index + 1) * 20);
    const match = /^(\d{10}) (\d{5}) ([nf]) \n$/.exec(entry);
    if (!match) {
      throw invalidInput(`Malformed xref entry ${index}`);
    }
    if (index > 0) {
      offsets.push(Number.parseInt(match[1], 10));
    }
  }

  const trailer = /trailer\n<<([^>]*)>>/.exec(text.slice(entriesStart + size * 20));
  const root = trailer ? /\/Root (\d+) 0 R/.exec(trailer[1]) : null;
  if (!root) {
    throw invalidInput("Container trailer has no /Root");
  }

  return { header, xrefOffset, size, rootId: Number.parseInt(root[1], 10), offsets };
};
