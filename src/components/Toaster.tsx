import { createContext, useContext, useState, useCallback } from "react";
import type { ReactNode } from "react";
import clsx from "clsx";

type Tone = "info" | "error";
type Toast = { id: string; text: string; tone: Tone };
type Ctx = { push: (text: string, tone?: Tone) => void };

const ToastCtx = createContext<Ctx>({ push: () => {} });

export function useToast(): Ctx {
  return useContext(ToastCtx);
}

export function ToastProvider({ children }: { children: ReactNode }) {
  const [items, setItems] = useState<Toast[]>([]);
  const push = useCallback((text: string, tone: Tone = "info") => {
    const id = crypto.randomUUID();
    setItems((prev) => [...prev, { id, text, tone }]);
    setTimeout(() => setItems((prev) => prev.filter((t) => t.id !== id)), tone === "error" ? 4000 : 2200);
  }, []);

  return (
    <ToastCtx.Provider value={{ push }}>
      {children}
      <div className="fixed top-3 right-3 z-[5000] space-y-2">
        {items.map((t) => (
          <div
            key={t.id}
            role={t.tone === "error" ? "alert" : "status"}
            className={clsx(
              "px-3 py-2 rounded-lg shadow border backdrop-blur text-sm",
              t.tone === "info" && "bg-white/95 text-slate-800",
              t.tone === "error" && "bg-red-50/95 text-red-800 border-red-200"
            )}
          >
            {t.text}
          </div>
        ))}
      </div>
    </ToastCtx.Provider>
  );
}
