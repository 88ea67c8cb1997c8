import { describe, expect, it } from "vitest";
import { formatReport, timelineText, type ReportInput } from "@/lib/report";

const input: ReportInput = {
    incidentType: "Building Fire",
    severity: "High",
    latitude: "12.9756",
    longitude: "77.5950",
    vehicle: "🚒 Fire Engine 1",
    officers: ["Officer A", "Officer B", "Officer C"],
    route: "Emergency Green Corridor",
    etaMinutes: 12,
    equipment: ["🧯 Fire Extinguisher", "🧤 Protective Gear"],
    waterUsedLiters: 500,
};

describe("formatReport", () => {
    it("fills every section of the template", () => {
        const lines = formatReport(input).split("\n");
        expect(lines).toContain("━━━━━━━━ 🚨 INCIDENT RESPONSE REPORT ━━━━━━━━");
        expect(lines).toContain("🔥 Incident Type : Building Fire");
        expect(lines).toContain("📍 Location      : 12.9756, 77.5950");
        expect(lines).toContain("⚠ Severity      : High");
        expect(lines).toContain("🚒 Vehicle       : 🚒 Fire Engine 1");
        expect(lines).toContain("👨‍🚒 Officers    : Officer A, Officer B, Officer C");
        expect(lines).toContain("🛣 AI Route      : Emergency Green Corridor");
        expect(lines).toContain("⏱ ETA           : 12 minutes");
        expect(lines).toContain("🧯 Fire Extinguisher, 🧤 Protective Gear");
        expect(lines).toContain("💧 Water Used: 500 Liters");
        expect(lines).toContain("✅ Status: INCIDENT SUCCESSFULLY RESOLVED");
    });

    it("narrates the three stages in order", () => {
        const lines = formatReport(input).split("\n");
        const start = lines.indexOf("🕒 Timeline:");
        expect(lines.slice(start + 1, start + 4)).toEqual([
            "🚨 Dispatched: Vehicle is on the way...",
            "🟡 On Scene: Firefighters reached incident site...",
            "🟢 Resolved: Incident cleared successfully!",
        ]);
    });

    it("embeds values verbatim, even odd ones", () => {
        const lines = formatReport({ ...input, incidentType: "", latitude: "abc", severity: "Extreme" }).split("\n");
        expect(lines).toContain("🔥 Incident Type : ");
        expect(lines).toContain("📍 Location      : abc, 77.5950");
        expect(lines).toContain("⚠ Severity      : Extreme");
    });
});

describe("timelineText", () => {
    it("renders only the stages asked for", () => {
        expect(timelineText(["dispatched"])).toBe("🚨 Dispatched: Vehicle is on the way...");
    });
});
