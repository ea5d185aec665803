// src/hooks/useViewportWidth.ts
import { useEffect, useState } from "react";

function readWidth(): number {
  return typeof window === "undefined" ? 0 : window.innerWidth;
}

/**
 * Width of the viewport in CSS px, kept current across resizes.
 * Parallax layers multiply page distance by this to get a pixel offset.
 */
export default function useViewportWidth(): number {
  const [width, setWidth] = useState<number>(readWidth);

  useEffect(() => {
    const update = () => setWidth(readWidth());

    update(); // catch a resize between first render and subscribe
    window.addEventListener("resize", update);
    return () => window.removeEventListener("resize", update);
  }, []);

  return width;
}
