"use client";

import { Check, ChevronDown } from "lucide-react";
import { useEffect, useRef, useState } from "react";
import { ALL_AUTHORITIES, type AuthorityCount } from "@/lib/summary";

type Props = {
  authorities: AuthorityCount[];
  total: number;
  selected: string;
  onChange: (authority: string) => void;
};

export function AuthorityFilter({ authorities, total, selected, onChange }: Props) {
  const [open, setOpen] = useState(false);
  const panelRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    function handleClick(e: MouseEvent) {
      if (!(e.target instanceof Node)) return;
      if (panelRef.current && !panelRef.current.contains(e.target)) {
        setOpen(false);
      }
    }
    document.addEventListener("mousedown", handleClick);
    return () => document.removeEventListener("mousedown", handleClick);
  }, []);

  function choose(authority: string) {
    onChange(authority);
    setOpen(false);
  }

  const options: AuthorityCount[] = [
    { name: ALL_AUTHORITIES, count: total },
    ...authorities,
  ];

  return (
    <div ref={panelRef} className="relative">
      <button
        type="button"
        onClick={() => setOpen((o) => !o)}
        aria-haspopup="listbox"
        aria-expanded={open}
        className="
          flex items-center gap-1.5 rounded-xl border bg-white px-3 py-2.5 text-sm
          font-medium text-gray-700 shadow-sm hover:bg-gray-50
          focus:outline-none focus:ring-2 focus:ring-blue-400
        "
      >
        Health Authority:
        <span className="text-gray-900">{selected}</span>
        <ChevronDown className="size-4 text-gray-400" />
      </button>

      {open && (
        <ul
          className="
            absolute left-0 top-full z-30 mt-1 max-h-80 w-80 overflow-auto rounded-xl
            border bg-white/95 p-1 shadow-lg backdrop-blur
          "
          role="listbox"
        >
          {options.map(({ name, count }) => (
            <li
              key={name}
              role="option"
              aria-selected={name === selected}
              onClick={() => choose(name)}
              className="flex cursor-pointer items-center gap-2 rounded-lg px-3 py-2 text-sm hover:bg-gray-50"
            >
              <Check
                className={`size-4 ${name === selected ? "text-blue-600" : "invisible"}`}
              />
              <span className="flex-1 text-gray-900">{name}</span>
              <span className="text-gray-400">({count})</span>
            </li>
          ))}
        </ul>
      )}
    </div>
  );
}
