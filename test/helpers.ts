/**
 * infiniview - Test Helpers
 * jsdom has no layout: ResizeObserver reports the size set here.
 */

import { vi } from "vitest";

const rect = (width: number, height: number): DOMRectReadOnly => ({
  x: 0,
  y: 0,
  width,
  height,
  top: 0,
  left: 0,
  right: width,
  bottom: height,
  toJSON: () => ({ width, height }),
});

export class ResizeObserverStub implements ResizeObserver {
  static instances: ResizeObserverStub[] = [];

  /** Size reported for observed elements */
  static size = { width: 200, height: 300 };

  private callback: ResizeObserverCallback;
  private targets: Element[] = [];

  constructor(callback: ResizeObserverCallback) {
    this.callback = callback;
    ResizeObserverStub.instances.push(this);
  }

  observe(target: Element): void {
    this.targets.push(target);
    const { width, height } = ResizeObserverStub.size;
    this.notify(target, width, height);
  }

  unobserve(target: Element): void {
    this.targets = this.targets.filter((t) => t !== target);
  }

  disconnect(): void {
    this.targets = [];
  }

  /** Report a new size for every observed element */
  resize(width: number, height: number): void {
    for (const target of this.targets) this.notify(target, width, height);
  }

  private notify(target: Element, width: number, height: number): void {
    this.callback(
      [
        {
          target,
          contentRect: rect(width, height),
          borderBoxSize: [],
          contentBoxSize: [],
          devicePixelContentBoxSize: [],
        },
      ],
      this,
    );
  }
}

/** Install the stub with the given observed size */
export const stubResizeObserver = (width = 200, height = 300): void => {
  ResizeObserverStub.instances = [];
  ResizeObserverStub.size = { width, height };
  vi.stubGlobal("ResizeObserver", ResizeObserverStub);
};

/** Latest observer created by the code under test */
export const lastResizeObserver = (): ResizeObserverStub => {
  const observer = ResizeObserverStub.instances[ResizeObserverStub.instances.length - 1];
  if (!observer) throw new Error("no ResizeObserver was created");
  return observer;
};

/** Fresh container attached to the document */
export const createContainer = (): HTMLElement => {
  const container = document.createElement("div");
  document.body.appendChild(container);
  return container;
};

/** Keys of the rendered wrappers, in DOM order */
export const renderedKeys = (root: HTMLElement, selector: string): string[] =>
  Array.from(root.querySelectorAll<HTMLElement>(selector), (el) => el.dataset.key ?? "");
