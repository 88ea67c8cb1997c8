import type { BarChartLayout, ChartLayout } from "@/lib/charts";

const MAX_TICK_CHARS = 14;

// Counted in code points so emoji prefixes aren't split.
export function tickLabel(label: string): string {
  const chars = Array.from(label);
  return chars.length <= MAX_TICK_CHARS ? label : chars.slice(0, MAX_TICK_CHARS - 1).join("") + "…";
}

function Bars({ chart }: { chart: BarChartLayout }) {
  const { W, H, P, innerW, innerH } = chart;
  const baseline = P + innerH;

  return (
    <svg width={W} height={H} viewBox={`0 0 ${W} ${H}`} role="img" aria-label={chart.title} className="block max-w-full h-auto">
      <text x={W / 2} y={P / 2 + 4} fontSize="14" fontWeight={600} textAnchor="middle" fill="#0f172a">
        {chart.title}
      </text>

      {/* Gridlines */}
      {chart.yTicks.map((t) => (
        <g key={t.value}>
          <line
            x1={P}
            x2={P + innerW}
            y1={t.y}
            y2={t.y}
            stroke={t.value === 0 ? "#94a3b8" : "#e2e8f0"}
            strokeDasharray={t.value === 0 ? "0" : "4 4"}
          />
          <text x={P - 8} y={t.y + 4} fontSize="10" textAnchor="end" fill="#64748b">
            {t.value}
          </text>
        </g>
      ))}

      {/* Axes */}
      <line x1={P} x2={P + innerW} y1={baseline} y2={baseline} stroke="#94a3b8" />
      <line x1={P} x2={P} y1={P} y2={baseline} stroke="#94a3b8" />

      {chart.bars.map((b) => (
        <g key={b.label}>
          <rect x={b.x} y={b.y} width={b.width} height={b.height} fill={chart.color} />
          <text
            x={b.x + b.width / 2}
            y={baseline + 14}
            fontSize="10"
            textAnchor="end"
            fill="#64748b"
            transform={`rotate(-15 ${b.x + b.width / 2} ${baseline + 14})`}
          >
            {tickLabel(b.label)}
          </text>
        </g>
      ))}

      <text
        x={12}
        y={P + innerH / 2}
        fontSize="11"
        textAnchor="middle"
        fill="#334155"
        transform={`rotate(-90 12 ${P + innerH / 2})`}
      >
        {chart.yLabel}
      </text>
      {chart.xLabel && (
        <text x={P + innerW / 2} y={H - 6} fontSize="11" textAnchor="middle" fill="#334155">
          {chart.xLabel}
        </text>
      )}
    </svg>
  );
}

/** Static chart image; no hover, no clicks. */
export default function ChartImage({ chart, caption }: { chart: ChartLayout; caption: string }) {
  return (
    <figure className="border rounded-lg p-4">
      <figcaption className="text-base font-semibold mb-3">{caption}</figcaption>
      {chart.kind === "placeholder" ? (
        <svg width={chart.W} height={chart.H} viewBox={`0 0 ${chart.W} ${chart.H}`} role="img" aria-label={chart.text} className="block max-w-full h-auto">
          <rect width={chart.W} height={chart.H} fill="#ffffff" stroke="#e2e8f0" />
          <text x={chart.W / 2} y={chart.H / 2} fontSize="14" textAnchor="middle" dominantBaseline="middle" fill="#0f172a">
            {chart.text}
          </text>
        </svg>
      ) : (
        <Bars chart={chart} />
      )}
    </figure>
  );
}
