import type { Rgb } from "./color.js";

export type RasterImage = {
  width: number;
  height: number;
  channels: 3 | 4;
  data: Buffer;
};

export type Quadrant = "top-left" | "top-right" | "bottom-right" | "bottom-left";

/**
 * Opaque RGB raster with hard-edged fill primitives. Rectangles are half-open
 * (`right`/`bottom` exclusive) and clipped to the canvas; a pixel belongs to a
 * disc when its centre lies inside the circle.
 */
export class RgbCanvas {
  readonly width: number;
  readonly height: number;
  readonly data: Buffer;

  constructor(width: number, height: number, background: Rgb, data?: Buffer) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new RangeError(`invalid canvas size: ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    if (data) {
      if (data.length !== width * height * 3) {
        throw new RangeError(`canvas buffer has ${data.length} bytes, expected ${width * height * 3}`);
      }
      this.data = data;
    } else {
      this.data = Buffer.alloc(width * height * 3);
      this.fillRect(0, 0, width, height, background);
    }
  }

  static fromRaster(image: RasterImage): RgbCanvas {
    if (image.channels !== 3) {
      throw new RangeError(`expected an RGB raster, got ${image.channels} channels`);
    }
    return new RgbCanvas(image.width, image.height, [0, 0, 0], image.data);
  }

  toRaster(): RasterImage {
    return { width: this.width, height: this.height, channels: 3, data: this.data };
  }

  getPixel(x: number, y: number): Rgb {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new RangeError(`pixel (${x}, ${y}) outside ${this.width}x${this.height} canvas`);
    }
    const idx = (y * this.width + x) * 3;
    return [this.data[idx], this.data[idx + 1], this.data[idx + 2]];
  }

  /** Writes one pixel; out-of-bounds writes are ignored. */
  setPixel(x: number, y: number, color: Rgb): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      return;
    }
    const idx = (y * this.width + x) * 3;
    this.data[idx] = color[0];
    this.data[idx + 1] = color[1];
    this.data[idx + 2] = color[2];
  }

  fillRect(left: number, top: number, right: number, bottom: number, color: Rgb): void {
    const x0 = Math.max(0, left);
    const y0 = Math.max(0, top);
    const x1 = Math.min(this.width, right);
    const y1 = Math.min(this.height, bottom);
    if (x0 >= x1 || y0 >= y1) {
      return;
    }
    const rowStart = (y0 * this.width + x0) * 3;
    const rowBytes = (x1 - x0) * 3;
    for (let i = rowStart; i < rowStart + rowBytes; i += 3) {
      this.data[i] = color[0];
      this.data[i + 1] = color[1];
      this.data[i + 2] = color[2];
    }
    for (let y = y0 + 1; y < y1; y += 1) {
      this.data.copy(this.data, (y * this.width + x0) * 3, rowStart, rowStart + rowBytes);
    }
  }

  /**
   * Fills one quadrant of the disc centred on (`cx`, `cy`). The quadrant names
   * the side of the centre that gets painted, so "top-left" covers the
   * `radius x radius` square above and left of the centre.
   */
  fillQuarterDisc(cx: number, cy: number, radius: number, quadrant: Quadrant, color: Rgb): void {
    if (radius <= 0) {
      return;
    }
    const left = quadrant === "top-left" || quadrant === "bottom-left" ? cx - radius : cx;
    const top = quadrant === "top-left" || quadrant === "top-right" ? cy - radius : cy;
    const rSquared = radius * radius;
    for (let y = top; y < top + radius; y += 1) {
      const dy = y + 0.5 - cy;
      for (let x = left; x < left + radius; x += 1) {
        const dx = x + 0.5 - cx;
        if (dx * dx + dy * dy <= rSquared) {
          this.setPixel(x, y, color);
        }
      }
    }
  }

  fillRoundedRect(
    left: number,
    top: number,
    right: number,
    bottom: number,
    radius: number,
    color: Rgb,
  ): void {
    const r = Math.max(0, Math.min(radius, Math.floor((right - left) / 2), Math.floor((bottom - top) / 2)));
    if (r === 0) {
      this.fillRect(left, top, right, bottom, color);
      return;
    }
    this.fillRect(left + r, top, right - r, bottom, color);
    this.fillRect(left, top + r, right, bottom - r, color);
    this.fillQuarterDisc(left + r, top + r, r, "top-left", color);
    this.fillQuarterDisc(right - r, top + r, r, "top-right", color);
    this.fillQuarterDisc(right - r, bottom - r, r, "bottom-right", color);
    this.fillQuarterDisc(left + r, bottom - r, r, "bottom-left", color);
  }

  /** Copies `source` with its top-left corner at (`left`, `top`), clipped. */
  paste(source: RgbCanvas, left: number, top: number): void {
    const x0 = Math.max(0, left);
    const x1 = Math.min(this.width, left + source.width);
    if (x0 >= x1) {
      return;
    }
    for (let sy = 0; sy < source.height; sy += 1) {
      const y = top + sy;
      if (y < 0 || y >= this.height) {
        continue;
      }
      const srcStart = (sy * source.width + (x0 - left)) * 3;
      source.data.copy(this.data, (y * this.width + x0) * 3, srcStart, srcStart + (x1 - x0) * 3);
    }
  }

  /**
   * Draws an RGB or RGBA raster at (`left`, `top`). RGBA pixels are blended
   * over the canvas using their alpha channel as the mask.
   */
  composite(image: RasterImage, left: number, top: number): void {
    const { width, height, channels, data } = image;
    for (let sy = 0; sy < height; sy += 1) {
      const y = top + sy;
      if (y < 0 || y >= this.height) {
        continue;
      }
      for (let sx = 0; sx < width; sx += 1) {
        const x = left + sx;
        if (x < 0 || x >= this.width) {
          continue;
        }
        const src = (sy * width + sx) * channels;
        const dst = (y * this.width + x) * 3;
        const alpha = channels === 4 ? data[src + 3] : 255;
        if (alpha === 0) {
          continue;
        }
        for (let c = 0; c < 3; c += 1) {
          this.data[dst + c] =
            alpha === 255
              ? data[src + c]
              : Math.round((data[src + c] * alpha + this.data[dst + c] * (255 - alpha)) / 255);
        }
      }
    }
  }

  /**
   * `width x height` region starting at (`left`, `top`); the canvas itself when
   * the region covers all of it.
   */
  crop(width: number, height: number, left = 0, top = 0): RgbCanvas {
    if (left === 0 && top === 0 && width === this.width && height === this.height) {
      return this;
    }
    if (left < 0 || top < 0 || left + width > this.width || top + height > this.height) {
      throw new RangeError(
        `cannot crop ${width}x${height} at (${left}, ${top}) from ${this.width}x${this.height} canvas`,
      );
    }
    const out = new RgbCanvas(width, height, [0, 0, 0]);
    out.paste(this, -left, -top);
    return out;
  }
}
