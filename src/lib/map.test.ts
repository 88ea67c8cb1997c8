import { describe, expect, it } from "vitest";
import { mapDocumentToHtml, parseCoordinate, renderMap } from "@/lib/map";
import { CoercionError } from "@/lib/errors";
import STATION from "@/config/station";

describe("parseCoordinate", () => {
    it("reads numeric text, ignoring surrounding spaces", () => {
        expect(parseCoordinate("latitude", "12.97")).toBe(12.97);
        expect(parseCoordinate("latitude", " -33.5 ")).toBe(-33.5);
        expect(parseCoordinate("longitude", "1e2")).toBe(100);
        expect(parseCoordinate("longitude", 77.59)).toBe(77.59);
    });

    it.each(["abc", "", "   ", "Infinity", "12,97", "0x10", "0b101", "0o7"])("rejects %j", (raw) => {
        expect(() => parseCoordinate("latitude", raw)).toThrow(CoercionError);
    });

    it("accepts the decimal forms a user might type", () => {
        expect(parseCoordinate("latitude", "+12.")).toBe(12);
        expect(parseCoordinate("latitude", ".5")).toBe(0.5);
        expect(parseCoordinate("longitude", "-7.5E-1")).toBe(-0.75);
    });

    it("rejects NaN passed as a number", () => {
        expect(() => parseCoordinate("longitude", Number.NaN)).toThrow(CoercionError);
    });
});

describe("renderMap", () => {
    it("draws the station, the incident and one two-point path", () => {
        const doc = renderMap("12.97", "77.59");
        expect(doc.markers).toHaveLength(2);
        expect(doc.markers.map((m) => m.tooltip)).toEqual(["Fire Station", "Incident Location"]);
        expect(doc.markers.map((m) => m.color)).toEqual(["green", "red"]);
        expect(doc.paths).toHaveLength(1);
        expect(doc.paths[0].points).toEqual([STATION.location, { lat: 12.97, lon: 77.59 }]);
        expect(doc.paths[0]).toMatchObject({ color: "red", weight: 5, animated: true });
        expect(doc.center).toEqual(STATION.location);
        expect(doc.zoom).toBe(13);
    });

    it("fails on a latitude that isn't a number", () => {
        let caught: unknown;
        try {
            renderMap("abc", "77.59");
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(CoercionError);
        expect(caught).toMatchObject({ field: "latitude", raw: "abc", name: "CoercionError" });
    });

    it.each(["0x10", "0b101", "0o7"])("fails on prefixed latitude %j instead of placing a marker", (lat) => {
        expect(() => renderMap(lat, "77.59")).toThrow(CoercionError);
    });

    it("uses the station it is given", () => {
        const doc = renderMap(1, 2, { ...STATION, name: "HQ", location: { lat: 0, lon: 0 }, zoom: 10 });
        expect(doc.markers[0]).toMatchObject({ tooltip: "HQ", position: { lat: 0, lon: 0 } });
        expect(doc.zoom).toBe(10);
    });
});

describe("mapDocumentToHtml", () => {
    it("embeds the document in a standalone page", () => {
        const html = mapDocumentToHtml(renderMap("12.97", "77.59"));
        expect(html.startsWith("<!DOCTYPE html>")).toBe(true);
        expect(html).toContain('<script src="https://unpkg.com/leaflet@1.9.4/dist/leaflet.js"></script>');
        expect(html).toContain('"tooltip":"Incident Location"');
        expect(html).toContain('"points":[{"lat":12.9716,"lon":77.5946},{"lat":12.97,"lon":77.59}]');
    });

    it("keeps marker text from closing the script tag", () => {
        const doc = renderMap(1, 2, { ...STATION, name: "</script><b>" });
        const html = mapDocumentToHtml(doc);
        expect(html).toContain('"tooltip":"\\u003c/script>\\u003cb>"');
    });
});
