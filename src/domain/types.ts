/**
 * Domain types for the shipment workflow.
 * Callers work only with these; ShipX wire shapes stay inside src/inpost.
 */

export interface Address {
  street: string;
  buildingNumber: string;
  city: string;
  postCode: string;
  /** ISO 3166-1 alpha-2 country code */
  countryCode: string;
}

/** Receiver or sender of a shipment */
export interface Party {
  firstName: string;
  lastName: string;
  companyName?: string;
  email: string;
  phone: string;
  address: Address;
}

export interface Parcel {
  dimensions: {
    length: number;
    width: number;
    height: number;
    unit: "mm";
  };
  weight: {
    amount: number;
    unit: "kg";
  };
  isNonStandard: boolean;
}

export interface Insurance {
  amount: number;
  /** ISO 4217 currency code */
  currency: string;
}

/** Everything the provider needs to create one shipment; the API assigns no fields of it */
export interface ShipmentRequest {
  receiver: Party;
  sender: Party;
  parcels: Parcel[];
  insurance?: Insurance;
  /** Provider-specific extras, e.g. sending_method or target_point */
  customAttributes?: Record<string, string>;
  /** ShipX service code, e.g. "inpost_courier_standard" */
  service: string;
  reference: string;
  comments?: string;
}

/** "created" and "confirmed" are the statuses the workflow acts on; others pass through */
export type ShipmentStatus = "created" | "confirmed" | (string & {});

export interface Shipment {
  id: string;
  status: ShipmentStatus;
  /** Sender's provider-assigned id, used as the dispatch point of the pickup */
  dispatchPointId?: string;
  /** Provider response as returned */
  raw: Record<string, unknown>;
}

export interface PickupContact {
  name: string;
  phone: string;
  email: string;
}

export interface DispatchOrderRequest {
  shipmentId: string;
  shipmentStatus: ShipmentStatus;
  dispatchPointId: string;
  address: Address;
  contact: PickupContact;
  /** YYYY-MM-DD */
  collectionDate: string;
}

export interface DispatchOrder {
  id: string;
  status?: string;
  raw: Record<string, unknown>;
}

/** What a successful run produced */
export interface ShipmentWorkflowReport {
  shipmentId: string;
  dispatchPointId: string;
  status: ShipmentStatus;
  dispatchOrderId: string;
  collectionDate: string;
  labelPath: string;
  printoutPath: string;
}

/** Step labels used in log entries */
export type WorkflowStep =
  | "prepare"
  | "create-shipment"
  | "confirm-shipment"
  | "generate-label"
  | "create-dispatch-order"
  | "generate-printout"
  | "workflow";
