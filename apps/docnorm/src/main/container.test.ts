import { describe, expect, it } from "vitest";
import sharp from "sharp";
import type { EncodedImage } from "../shared/contracts.js";
import { ByteWriter, assembleContainer, buildContentProgram, readContainerLayout } from "./container.js";

const FAKE_JPEG = new Uint8Array([0xff, 0xd8, 0xff, 0xd9]);

const latin1 = (bytes: Uint8Array): string => Buffer.from(bytes).toString("latin1");

const fakeImage = (overrides: Partial<EncodedImage> = {}): EncodedImage => ({
  bytes: FAKE_JPEG,
  width: 2,
  height: 3,
  codec: "jpeg",
  ...overrides,
});

describe("ByteWriter", () => {
  it("tracks the true byte length across ascii and binary writes", () => {
    const writer = new ByteWriter();
    writer.writeAscii("%PDF").writeBytes(new Uint8Array([0xe2, 0xe3]));
    expect(writer.length).toBe(6);
    expect(Array.from(writer.toBytes())).toEqual([0x25, 0x50, 0x44, 0x46, 0xe2, 0xe3]);
  });
});

describe("assembleContainer", () => {
  it("records exact object offsets for a small image", () => {
    const container = assembleContainer(fakeImage());

    expect(container.objects.map((record) => record.offset)).toEqual([15, 64, 121, 247, 412]);
    expect(container.objects.map((record) => record.id)).toEqual([1, 2, 3, 4, 5]);
    expect(container.xrefOffset).toBe(488);
  });

  it("writes header, xref and trailer in the fixed format", () => {
    const { bytes } = assembleContainer(fakeImage());
    const text = latin1(bytes);

    expect(text.startsWith("%PDF-1.4\n%âãÏÓ\n")).toBe(true);
    expect(text.slice(488)).toBe(
      [
        "xref",
        "0 6",
        "0000000000 65535 f ",
        "0000000015 00000 n ",
        "0000000064 00000 n ",
        "0000000121 00000 n ",
        "0000000247 00000 n ",
        "0000000412 00000 n ",
        "trailer",
        "<< /Size 6 /Root 1 0 R >>",
        "startxref",
        "488",
        "%%EOF",
        "",
      ].join("\n")
    );
  });

  it("declares the page box, image resource and content stream", () => {
    const text = latin1(assembleContainer(fakeImage()).bytes);

    expect(text).toContain(
      "<< /Type /Page /Parent 2 0 R /MediaBox [0 0 2 3] /Resources << /XObject << /Im0 4 0 R >> >> /Contents 5 0 R >>"
    );
    expect(text).toContain(
      "<< /Type /XObject /Subtype /Image /Width 2 /Height 3 /ColorSpace /DeviceRGB /BitsPerComponent 8 /Filter /DCTDecode /Length 4 >>"
    );
    expect(text).toContain("<< /Length 26 >>\nstream\nq\n2 0 0 3 0 0 cm\n/Im0 Do\nQ\nendstream\n");
  });

  it("embeds the encoded bytes verbatim", () => {
    const { bytes } = assembleContainer(fakeImage());
    const text = latin1(bytes);
    const start = text.indexOf("stream\n", text.indexOf("4 0 obj")) + "stream\n".length;

    expect(Array.from(bytes.subarray(start, start + FAKE_JPEG.length))).toEqual(Array.from(FAKE_JPEG));
    expect(text.slice(start + FAKE_JPEG.length, start + FAKE_JPEG.length + 11)).toBe("\nendstream\n");
  });

  it("keeps offsets valid for a real JPEG payload containing arbitrary bytes", async () => {
    const jpeg = await sharp({
      create: { width: 37, height: 23, channels: 3, background: { r: 200, g: 30, b: 90 } },
    })
      .jpeg({ quality: 60 })
      .toBuffer();

    const { bytes } = assembleContainer({ bytes: jpeg, width: 37, height: 23, codec: "jpeg" });
    const layout = readContainerLayout(bytes);
    const text = latin1(bytes);

    expect(layout.header).toBe("%PDF-1.4\n");
    expect(layout.size).toBe(6);
    expect(layout.rootId).toBe(1);
    expect(layout.offsets).toHaveLength(5);
    layout.offsets.forEach((offset, index) => {
      expect(text.startsWith(`${index + 1} 0 obj`, offset)).toBe(true);
    });
    expect(text).toContain(`/Length ${jpeg.byteLength} >>`);
    expect(text.endsWith(`startxref\n${layout.xrefOffset}\n%%EOF\n`)).toBe(true);
  });

  it("rejects non-JPEG payloads and invalid dimensions", () => {
    expect(() => assembleContainer(fakeImage({ codec: "png" }))).toThrow(/requires JPEG/);
    expect(() => assembleContainer(fakeImage({ width: 0 }))).toThrow(/Invalid image dimensions/);
    expect(() => assembleContainer(fakeImage({ height: 1.5 }))).toThrow(/Invalid image dimensions/);
    expect(() => assembleContainer(fakeImage({ bytes: new Uint8Array() }))).toThrow(/empty/);
  });
});

describe("buildContentProgram", () => {
  it("scales the unit square to the page", () => {
    expect(buildContentProgram(1500, 2000)).toBe("q\n1500 0 0 2000 0 0 cm\n/Im0 Do\nQ");
  });
});

describe("readContainerLayout", () => {
  it("rejects buffers without a PDF header", () => {
    expect(() => readContainerLayout(new TextEncoder().encode("hello"))).toThrow(/PDF header/);
  });

  it("rejects containers whose startxref does not point at an xref table", () => {
    const broken = new TextEncoder().encode("%PDF-1.4\nstartxref\n3\n%%EOF\n");
    expect(() => readContainerLayout(broken)).toThrow(/No xref section/);
  });
});
