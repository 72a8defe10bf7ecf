/**
 * Shared orders data for tests.
 */

import { buildOrdersFile, OrdersStore } from "../../src/orders/store.js";
import type { OrderRecordT, OrdersFileT } from "../../src/schemas/orders.js";

export const FIXTURE_NOW = new Date("2025-05-01T10:00:00.000Z");

export function fixtureOrders(): OrderRecordT[] {
  return [
    {
      order_id: "FU70001236",
      client: "THALES",
      code_agence: "MRS",
      emploi_cc: "10A3071",
      categorie_socio: "ETAM",
      classement_cc: "B2",
      centre_analyse: "1FRA / PLADI/BP/PST04",
      centre_analyse_prefix: "1FRA",
      site_mission: "LYON",
      date_debut: "2025-02-01",
      site_not_gemenos: true,
    },
    {
      order_id: "FU70001237",
      client: "THALES",
      code_agence: "MRS",
      emploi_cc: "20B1000",
      categorie_socio: "ETAM",
      site_mission: "THALES GEMENOS",
      site_not_gemenos: false,
    },
    {
      order_id: "FU70001238",
      client: "THALES",
      code_agence: "AIX",
      emploi_cc: "10A3071",
      categorie_socio: "CADRE",
      centre_analyse: "9310 - MRS",
      centre_analyse_prefix: "9310",
      date_debut: "2025-03-01",
    },
  ];
}

export function fixtureOrdersFile(): OrdersFileT {
  return buildOrdersFile(fixtureOrders(), { clientName: "THALES", source: "test", now: FIXTURE_NOW });
}

/** In-memory store; nothing is read from disk until save() is called. */
export function fixtureStore(path = "/tmp/order-xml-corrector-test/orders.json"): OrdersStore {
  return new OrdersStore(path, fixtureOrdersFile());
}

/** Assignment document without an order number element. */
export const ASSIGNMENT_XML = [
  '<?xml version="1.0" encoding="UTF-8"?>',
  "<Assignment>",
  "  <ReferenceInformation>",
  "    <OrderId>",
  "      <IdOwner>AGENCY</IdOwner>",
  "    </OrderId>",
  "  </ReferenceInformation>",
  "  <CustomerJobCode>FU70001236</CustomerJobCode>",
  "  <WorkSite>",
  "    <WorkSiteName>OLD SITE</WorkSiteName>",
  "  </WorkSite>",
  "</Assignment>",
  "",
].join("\n");
