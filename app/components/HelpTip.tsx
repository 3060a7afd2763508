// app/components/HelpTip.tsx
"use client";

import { useCallback, useEffect, useRef, useState } from "react";
import { createPortal } from "react-dom";

type Placement = "above" | "below";

type Props = {
  text: string;
  placement?: Placement;
  children: React.ReactNode;
};

const EDGE_PADDING = 10;
const GAP = 8;

export function HelpTip({ text, placement = "above", children }: Props) {
  const anchorRef = useRef<HTMLSpanElement | null>(null);
  const [open, setOpen] = useState(false);
  const [pos, setPos] = useState<{ left: number; top: number } | null>(null);

  const canPortal = typeof document !== "undefined";

  const place = useCallback(() => {
    const el = anchorRef.current;
    if (!el) return;

    const r = el.getBoundingClientRect();
    const left = Math.max(EDGE_PADDING, Math.min(window.innerWidth - EDGE_PADDING, r.left + r.width / 2));
    const top = placement === "above" ? r.top - GAP : r.bottom + GAP;

    setPos({ left, top });
  }, [placement]);

  useEffect(() => {
    if (!open) return;
    place();
    window.addEventListener("scroll", place, true);
    window.addEventListener("resize", place);
    return () => {
      window.removeEventListener("scroll", place, true);
      window.removeEventListener("resize", place);
    };
  }, [open, place]);

  return (
    <>
      <span
        ref={anchorRef}
        className="tipAnchor"
        onMouseEnter={() => setOpen(true)}
        onMouseLeave={() => setOpen(false)}
        onFocus={() => setOpen(true)}
        onBlur={() => setOpen(false)}
        tabIndex={0}
        aria-label={text}
      >
        {children}
      </span>

      {canPortal && open && pos
        ? createPortal(
            <div className={`tooltipBubble ${placement}`} role="tooltip" style={{ left: pos.left, top: pos.top }}>
              {text}
            </div>,
            document.body
          )
        : null}
    </>
  );
}
