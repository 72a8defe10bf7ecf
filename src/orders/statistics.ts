import type { OrderRecordT, OrderStatisticsT } from "../schemas/orders.js";

function uniqueValues(orders: ReadonlyArray<OrderRecordT>, pick: (order: OrderRecordT) => string | undefined): string[] {
  const seen = new Set<string>();
  for (const order of orders) {
    const value = pick(order);
    if (value) seen.add(value);
  }
  return [...seen];
}

/**
 * Aggregates stored alongside the orders. Unique lists keep first-seen order.
 */
export function computeOrderStatistics(orders: ReadonlyArray<OrderRecordT>, now: Date = new Date()): OrderStatisticsT {
  const agencies = uniqueValues(orders, order => order.code_agence);
  const ordersPerAgency: Record<string, number> = {};
  for (const agency of agencies) {
    ordersPerAgency[agency] = orders.filter(order => order.code_agence === agency).length;
  }

  return {
    total_orders: orders.length,
    unique_agency_codes: agencies,
    unique_job_codes: uniqueValues(orders, order => order.emploi_cc),
    unique_socio_categories: uniqueValues(orders, order => order.categorie_socio),
    unique_classifications: uniqueValues(orders, order => order.classement_cc),
    orders_per_agency: ordersPerAgency,
    updated_at: now.toISOString(),
  };
}
