/**
 * Example courier shipment used when the CLI is run without a shipment file.
 */

import type { ShipmentRequest } from "../domain/types.js";

export const sampleShipment: ShipmentRequest = {
  receiver: {
    firstName: "Jan",
    lastName: "Kowalski",
    email: "jan.kowalski@example.com",
    phone: "123456789",
    address: {
      street: "ul. Testowa 1",
      buildingNumber: "1",
      city: "Warszawa",
      postCode: "00-001",
      countryCode: "PL",
    },
  },
  sender: {
    firstName: "Anna",
    lastName: "Nowak",
    email: "anna.nowak@example.com",
    phone: "987654321",
    address: {
      street: "ul. Przykładowa 2",
      buildingNumber: "2",
      city: "Kraków",
      postCode: "30-002",
      countryCode: "PL",
    },
  },
  parcels: [
    {
      dimensions: { length: 300, width: 200, height: 100, unit: "mm" },
      weight: { amount: 2.5, unit: "kg" },
      isNonStandard: false,
    },
  ],
  insurance: { amount: 25, currency: "PLN" },
  customAttributes: {
    sending_method: "dispatch_order",
    target_point: "KRA012",
  },
  service: "inpost_courier_standard",
  reference: "ORDER_12345",
  comments: "Please handle the package with care",
};
