export type Adapter = "pdf" | "image" | "unsupported";

export type RasterOptions = {
  dpi: number;
};

/** PDF bytes in, PNG page images out, in document order. */
export interface RasterEngine {
  rasterize(bytes: Uint8Array, opts: RasterOptions): AsyncIterable<Uint8Array>;
}

/** One page image in, recognized text out. */
export interface TextEngine {
  recognize(image: Uint8Array): Promise<string>;
  terminate(): Promise<void>;
}

export type TextEngineFactory = (lang: string) => Promise<TextEngine>;

export type IngestOptions = {
  mime?: string;
  filename?: string;
};
