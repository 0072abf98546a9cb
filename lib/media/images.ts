/**
 * Uploaded images: base64 data URIs in, files under MEDIA_ROOT out.
 *
 * Stored paths are relative to the media root (e.g. "recipes/images/<uuid>.png")
 * and served back through /media/<path>.
 */

import * as path from "path";
import * as fs from "fs/promises";
import { v4 as uuidv4 } from "uuid";
import * as z from "zod";
import { getMediaRoot } from "@/lib/config/data-dir";

export const IMAGE_EXTENSIONS = ["png", "jpeg", "jpg", "gif", "webp"] as const;
export type ImageExtension = (typeof IMAGE_EXTENSIONS)[number];

export type MediaFolder = "recipes/images" | "users/avatars";

export interface DecodedImage {
  extension: ImageExtension;
  data: Buffer;
}

const DATA_URI_PATTERN = /^data:image\/([a-z0-9.+-]+);base64,([\s\S]*)$/i;
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

const CONTENT_TYPES: Record<string, string> = {
  png: "image/png",
  jpeg: "image/jpeg",
  jpg: "image/jpeg",
  gif: "image/gif",
  webp: "image/webp",
};

function isImageExtension(value: string): value is ImageExtension {
  return IMAGE_EXTENSIONS.some((ext) => ext === value);
}

/** Parses `data:image/<ext>;base64,<payload>`; null when it is not a usable image. */
export function decodeImageDataUri(value: string): DecodedImage | null {
  const match = DATA_URI_PATTERN.exec(value.trim());
  if (!match) return null;
  const extension = match[1].toLowerCase();
  if (!isImageExtension(extension)) return null;

  const payload = match[2].replace(/\s+/g, "");
  if (payload.length === 0 || payload.length % 4 !== 0 || !BASE64_PATTERN.test(payload)) {
    return null;
  }
  return { extension, data: Buffer.from(payload, "base64") };
}

export const imageDataUriSchema = z.string().transform((value, ctx) => {
  const image = decodeImageDataUri(value);
  if (!image) {
    ctx.addIssue({
      code: "custom",
      message: `Upload a valid image as a base64 data URI (${IMAGE_EXTENSIONS.join(", ")}).`,
    });
    return z.NEVER;
  }
  return image;
});

/** Writes the image and returns its path relative to the media root. */
export async function saveImage(image: DecodedImage, folder: MediaFolder): Promise<string> {
  const relative = `${folder}/${uuidv4()}.${image.extension}`;
  const target = path.join(getMediaRoot(), relative);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, image.data);
  return relative;
}

/** Removes a stored file; a file that is already gone is not an error. */
export async function deleteImage(relative: string): Promise<void> {
  const target = resolveMediaPath(relative);
  if (!target) return;
  try {
    await fs.unlink(target);
  } catch (err) {
    if (isMissingFileError(err)) return;
    throw err;
  }
}

export function isMissingFileError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/**
 * Absolute path for a media-relative path.
 * Null when the path escapes the media root.
 */
export function resolveMediaPath(relative: string): string | null {
  const root = getMediaRoot();
  const target = path.resolve(root, relative);
  if (!target.startsWith(root + path.sep)) return null;
  return target;
}

export function mediaUrl(origin: string, relative: string): string {
  return `${origin}/media/${relative}`;
}

export function contentTypeFor(filePath: string): string {
  const ext = path.extname(filePath).slice(1).toLowerCase();
  return CONTENT_TYPES[ext] ?? "application/octet-stream";
}
