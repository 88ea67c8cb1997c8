import clsx from "clsx";
import type { IncidentRecord } from "@/types";
import { HISTORY_COLUMNS, toHistoryRow } from "@/lib/history";

export default function HistoryTable({
  records,
  selectedIndex,
  onSelect,
}: {
  records: readonly IncidentRecord[];
  selectedIndex?: number;
  onSelect?: (index: number) => void;
}) {
  return (
    <div className="border rounded-lg overflow-auto max-h-80">
      <table className="min-w-full text-sm">
        <thead className="bg-slate-50 sticky top-0">
          <tr>
            {HISTORY_COLUMNS.map((c) => (
              <th key={c} className="text-left font-medium px-2 py-1.5 whitespace-nowrap border-b">
                {c}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {records.length === 0 && (
            <tr>
              <td colSpan={HISTORY_COLUMNS.length} className="px-2 py-3 text-gray-500">
                No incidents dispatched.
              </td>
            </tr>
          )}
          {records.map((r, i) => {
            const row = toHistoryRow(r);
            return (
              <tr
                key={i}
                onClick={() => onSelect?.(i)}
                className={clsx("cursor-pointer hover:bg-gray-50", selectedIndex === i && "bg-slate-100")}
              >
                {HISTORY_COLUMNS.map((c) => (
                  <td key={c} className="px-2 py-1 whitespace-nowrap border-b">
                    {row[c]}
                  </td>
                ))}
              </tr>
            );
          })}
        </tbody>
      </table>
    </div>
  );
}
