/**
 * ShipX API request/response shapes (external API contract).
 * Used only inside src/inpost; domain types stay in domain/.
 */

export interface ShipxAddress {
  street: string;
  building_number: string;
  city: string;
  post_code: string;
  country_code: string;
}

export interface ShipxPeer {
  first_name: string;
  last_name: string;
  company_name?: string;
  email: string;
  phone: string;
  address: ShipxAddress;
}

/** ShipX takes dimensions and weight as decimal strings */
export interface ShipxParcel {
  dimensions: {
    length: string;
    width: string;
    height: string;
    unit: "mm";
  };
  weight: {
    amount: string;
    unit: "kg";
  };
  is_non_standard: boolean;
}

export interface ShipxShipmentPayload {
  receiver: ShipxPeer;
  sender: ShipxPeer;
  parcels: ShipxParcel[];
  insurance?: {
    amount: string;
    currency: string;
  };
  custom_attributes?: Record<string, string>;
  service: string;
  reference: string;
  comments?: string;
}

export interface ShipxDispatchOrderPayload {
  status: string;
  shipments: string[];
  dispatch_point_id: string[];
  address: ShipxAddress;
  contact: {
    name: string;
    phone: string;
    email: string;
  };
  collection_date: string;
}

/** Error body ShipX returns with 4xx/5xx */
export interface ShipxErrorResponse {
  status?: number;
  error?: string;
  message?: string;
  description?: string;
  details?: unknown;
}

export type ShipxLabelType = "normal" | "A6";
