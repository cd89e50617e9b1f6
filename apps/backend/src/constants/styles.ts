export const IMAGE_STYLES = ["realistic", "cyberpunk", "cartoon"] as const;

export type ImageStyle = (typeof IMAGE_STYLES)[number];

// cyberpunk and cartoon intentionally share a backend model.
export const styleModels: Record<ImageStyle, string> = {
  realistic: "stabilityai/stable-diffusion-xl-base-1.0",
  cyberpunk: "black-forest-labs/FLUX.1-dev",
  cartoon: "black-forest-labs/FLUX.1-dev"
};

export const isImageStyle = (value: unknown): value is ImageStyle =>
  IMAGE_STYLES.some((style) => style === value);
