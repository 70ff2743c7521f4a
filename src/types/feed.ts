/**
 * Feed and image type definitions
 */

export interface FeedItem {
  url: string; // Image URL, already resolved against the feed URL
  id: string; // Unique entry id; falls back to the image URL
}

export interface ImageDimensions {
  width: number;
  height: number;
}

export type ImageFormat = "gif" | "jpeg" | "png";
