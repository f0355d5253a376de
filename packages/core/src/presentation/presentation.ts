/**
 * packages/core/src/presentation/presentation.ts — Slides and navigation.
 */

import type { RenderOperation } from "./operations.js";

export type Slide = Readonly<{
  operations: readonly RenderOperation[];
}>;

/**
 * Ordered slides plus a cursor. Jumps report whether the cursor moved and
 * never leave `[0, totalSlides())`.
 */
export class Presentation {
  readonly slides: readonly Slide[];
  private currentIndex = 0;

  constructor(slides: readonly Slide[]) {
    this.slides = Object.freeze([...slides]);
  }

  totalSlides(): number {
    return this.slides.length;
  }

  currentSlideIndex(): number {
    return this.currentIndex;
  }

  currentSlide(): Slide {
    const slide = this.slides[this.currentIndex];
    // A built presentation always holds at least one slide.
    return slide ?? { operations: [] };
  }

  jumpNextSlide(): boolean {
    return this.jumpSlide(this.currentIndex + 1);
  }

  jumpPreviousSlide(): boolean {
    return this.jumpSlide(this.currentIndex - 1);
  }

  jumpFirstSlide(): boolean {
    return this.jumpSlide(0);
  }

  jumpLastSlide(): boolean {
    return this.jumpSlide(this.slides.length - 1);
  }

  /** Move to `index` when it is in range; out-of-range indexes are ignored. */
  jumpSlide(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.slides.length) return false;
    if (index === this.currentIndex) return false;
    this.currentIndex = index;
    return true;
  }
}
