import type { RecordReader } from '@rowsift/core';
import { defineUsedColumns } from '@rowsift/core';
import { readZipCode } from './zipCode.js';

export type ServiceRequestStatus = 'open' | 'closed';

const STATUSES: readonly ServiceRequestStatus[] = ['open', 'closed'];

/** One service request filed with the city. */
export interface ServiceRequest {
  readonly id: string;
  readonly zipCode: string;
  readonly serviceName: string;
  /** `null` when the status is not one of the known values. */
  readonly status: ServiceRequestStatus | null;
  /** `null` when the request date is empty or unparseable. */
  readonly requestedAt: Date | null;
}

export interface ServiceRequestColumns {
  /** Default: `'service_request_id'`. */
  readonly id?: string;
  /** Default: `'zip_code'`. */
  readonly zipCode?: string;
  /** Default: `'service_name'`. */
  readonly serviceName?: string;
  /** Default: `'status'`. */
  readonly status?: string;
  /** Default: `'requested_datetime'`. */
  readonly requestedAt?: string;
}

export function createServiceRequestReader(columns?: ServiceRequestColumns): RecordReader<ServiceRequest> {
  const id = columns?.id ?? 'service_request_id';
  const zipCode = columns?.zipCode ?? 'zip_code';
  const serviceName = columns?.serviceName ?? 'service_name';
  const status = columns?.status ?? 'status';
  const requestedAt = columns?.requestedAt ?? 'requested_datetime';

  return {
    usedColumns: defineUsedColumns([id, zipCode, serviceName, status, requestedAt]),
    defaultValue: () => '',
    buildRecord: (fields) => ({
      id: fields.text(id, { required: true }),
      zipCode: readZipCode(fields, zipCode),
      serviceName: fields.text(serviceName, { required: true }),
      status: fields.oneOf(status, STATUSES, { required: true, ignoreCase: true }),
      requestedAt: fields.date(requestedAt),
    }),
  };
}
