import type { Severity, Stage } from "@/types";

export const STAGE_MESSAGES: Record<Stage, string> = {
    dispatched: "🚨 Dispatched: Vehicle is on the way...",
    on_scene: "🟡 On Scene: Firefighters reached incident site...",
    resolved: "🟢 Resolved: Incident cleared successfully!",
};

export const STAGE_ORDER: readonly Stage[] = ["dispatched", "on_scene", "resolved"];

export type ReportInput = {
    incidentType: string;
    severity: Severity | string;
    latitude: string | number;
    longitude: string | number;
    vehicle: string;
    officers: readonly string[];
    route: string;
    etaMinutes: number;
    equipment: readonly string[];
    waterUsedLiters: number | string;
};

export function timelineText(stages: readonly Stage[] = STAGE_ORDER): string {
    return stages.map((s) => STAGE_MESSAGES[s]).join("\n");
}

// Values go in as given; nothing here validates or rounds.
export function formatReport(r: ReportInput): string {
    return `
━━━━━━━━ 🚨 INCIDENT RESPONSE REPORT ━━━━━━━━

🔥 Incident Type : ${r.incidentType}
📍 Location      : ${r.latitude}, ${r.longitude}
⚠ Severity      : ${r.severity}

🚒 Vehicle       : ${r.vehicle}
👨‍🚒 Officers    : ${r.officers.join(", ")}

🛣 AI Route      : ${r.route}
⏱ ETA           : ${r.etaMinutes} minutes

🧰 Equipment Used:
${r.equipment.join(", ")}
💧 Water Used: ${r.waterUsedLiters} Liters

🕒 Timeline:
${timelineText()}

✅ Status: INCIDENT SUCCESSFULLY RESOLVED
━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
`;
}
