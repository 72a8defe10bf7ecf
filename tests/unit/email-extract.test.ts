import { describe, it, expect } from "vitest";
import {
  extractFactsFromEmail,
  htmlToText,
  looksLikeHtml,
  readLabelledFields,
} from "../../src/facts/email-extract.js";

describe("extractFactsFromEmail", () => {
  it("reads labelled fields", () => {
    const email = [
      "Bonjour,",
      "Numéro de commande : fu70001236",
      "Emploi : 10A3071",
      "Centre d'analyse : 1FRA / PLADI",
      "Site de mission : Gemenos",
      "Cordialement",
    ].join("\n");

    const record = extractFactsFromEmail(email);

    expect(record?.facts).toEqual({
      order_id: "FU70001236",
      emploi_cc: "10A3071",
      centre_analyse: "1FRA / PLADI",
      centre_analyse_prefix: "1FRA",
      site_mission: "Gemenos",
    });
    expect(record?.flags).toEqual({ site_not_gemenos: false });
  });

  it("falls back to a bare order number", () => {
    const record = extractFactsFromEmail("Hello, please fix order FU70001237 asap");

    expect(record?.facts).toEqual({ order_id: "FU70001237" });
    expect(record?.flags).toEqual({ site_not_gemenos: true });
  });

  it("looks for a bare token when the labelled value does not match", () => {
    const record = extractFactsFromEmail("Commande : 12345\nRef FU70001239");
    expect(record?.facts.order_id).toBe("FU70001239");
  });

  it("reads HTML bodies", () => {
    const record = extractFactsFromEmail(
      "<html><body><p>Commande : FU70001238</p><p>Agence : MRS</p></body></html>"
    );

    expect(record?.facts).toEqual({ order_id: "FU70001238", code_agence: "MRS" });
  });

  it("honours a custom order number pattern", () => {
    const record = extractFactsFromEmail("Order AB-123", { orderIdPattern: "AB-\\d{3}" });
    expect(record?.facts.order_id).toBe("AB-123");
  });

  it("returns null without an order number", () => {
    expect(extractFactsFromEmail("Agence : MRS")).toBeNull();
  });
});

describe("readLabelledFields", () => {
  it("keeps the first occurrence of a label", () => {
    expect(readLabelledFields("Emploi : A\nEmploi : B")).toEqual({ emploi_cc: "A" });
  });

  it("ignores unknown labels and empty values", () => {
    expect(readLabelledFields("Objet : relance\nAgence :\nSite : Lyon")).toEqual({ site_mission: "Lyon" });
  });
});

describe("html helpers", () => {
  it("detects HTML bodies", () => {
    expect(looksLikeHtml("<div>x</div>")).toBe(true);
    expect(looksLikeHtml("a < b")).toBe(false);
  });

  it("strips tags and decodes common entities", () => {
    expect(htmlToText("<p>R&amp;D</p>line<br/>two&nbsp;x<style>p{}</style>")).toBe("R&D\nline\ntwo x");
  });
});
