import fs from "fs/promises";
import path from "path";
import { SUPPORTED_IMAGE_TYPES } from "./constants";
import type { ImagePart } from "./domain/schema";
import { UnsupportedImageError } from "./errors";

type SupportedExtension = keyof typeof SUPPORTED_IMAGE_TYPES;

const isSupportedExtension = (ext: string): ext is SupportedExtension => {
    return Object.hasOwn(SUPPORTED_IMAGE_TYPES, ext);
};

export const mimeTypeForPath = (filePath: string): string => {
    const ext = path.extname(filePath).toLowerCase();
    if (!isSupportedExtension(ext)) {
        const supported = Object.keys(SUPPORTED_IMAGE_TYPES).join(", ");
        throw new UnsupportedImageError(`Unsupported image type "${ext || filePath}". Use one of: ${supported}`);
    }
    return SUPPORTED_IMAGE_TYPES[ext];
};

export const imagePartFromBuffer = (buffer: Buffer, mimeType: string): ImagePart => ({
    kind: "image",
    mimeType,
    data: buffer.toString("base64"),
});

export const loadImage = async (filePath: string): Promise<ImagePart> => {
    const mimeType = mimeTypeForPath(filePath);
    try {
        const buffer = await fs.readFile(filePath);
        return imagePartFromBuffer(buffer, mimeType);
    } catch (error) {
        throw new UnsupportedImageError(`Could not read image at ${filePath}`, { cause: error });
    }
};
