import type { ImageStyle } from "../constants/styles.js";
import type { GenerationRecord } from "../types/models.js";

export const DEFAULT_PAGE_SIZE = 9;

export type GalleryQuery = {
  style?: ImageStyle | "all";
  page?: number;
  pageSize?: number;
};

export type GalleryPage = {
  items: GenerationRecord[];
  page: number;
  pageSize: number;
  totalItems: number;
  totalPages: number;
};

// Out-of-range pages are clamped into [1, max(1, totalPages)].
export const buildGalleryPage = (
  records: GenerationRecord[],
  { style = "all", page = 1, pageSize = DEFAULT_PAGE_SIZE }: GalleryQuery = {}
): GalleryPage => {
  const filtered = style === "all" ? records : records.filter((record) => record.expectedStyle === style);
  const totalPages = Math.ceil(filtered.length / pageSize);
  const currentPage = Math.min(Math.max(1, page), Math.max(1, totalPages));
  const start = (currentPage - 1) * pageSize;

  return {
    items: filtered.slice(start, start + pageSize),
    page: currentPage,
    pageSize,
    totalItems: filtered.length,
    totalPages
  };
};
