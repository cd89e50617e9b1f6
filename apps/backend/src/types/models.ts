import type { ImageStyle } from "../constants/styles.js";

export type GenerationRecord = {
  id: number;
  prompt: string;
  expectedStyle: ImageStyle;
  imageRef: string;
  createdAt: Date;
  score: number | null;
  feedback: string | null;
};

export type GeneratedImage = {
  buffer: Buffer;
  width: number;
  height: number;
  format: "png";
  modelId: string | null;
  mode: "live" | "fallback";
};
