/**
 * @fileoverview Album art barrel exports
 *
 * @module domain/albumArt
 */

export { applyAlbumArt, coverTargetOf, type CoverTarget } from "./applyAlbumArt.js";
export { resizeImage, fitWithin, type ResizeOptions, type PreparedImage } from "./imageResize.js";
export { writeMp3Cover } from "./mp3Cover.js";
export { embedFlacPicture, readFlacPictures, encodePicture, type FlacPicture } from "./flacPicture.js";
