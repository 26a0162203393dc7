/**
 * Validation schemas using Zod for runtime validation of service payloads
 */

import { z } from 'zod';

export const CHEAPEST_SERVICE = 'cheapest';

const ShipmentIdsSchema = z.array(z.string().uuid()).min(1);

export const BulkUpdateRequestSchema = z
  .object({
    shipmentIds: ShipmentIdsSchema,
    addressId: z.string().uuid().nullish(),
    packageId: z.string().uuid().nullish(),
  })
  .refine((request) => Boolean(request.addressId || request.packageId), {
    message: 'Either addressId or packageId is required',
  });

export const BulkDeleteRequestSchema = z.object({
  shipmentIds: ShipmentIdsSchema,
});

export const VerifyAddressesRequestSchema = z.object({
  shipmentIds: z.array(z.string().uuid()).optional(),
});

export const BulkServiceRequestSchema = z.object({
  shipmentIds: ShipmentIdsSchema,
  service: z.string().min(1),
});

export const LabelSizeSchema = z.enum(['letter_a4', '4x6']);

export const PurchaseRequestSchema = z.object({
  shipmentIds: ShipmentIdsSchema,
  labelSize: LabelSizeSchema,
  termsAccepted: z.boolean(),
});

/**
 * Query-string parameters: blank values mean "not supplied"
 */
const optionalNumber = (schema: z.ZodNumber) =>
  z.preprocess(
    (value) => (value === undefined || value === null || value === '' ? undefined : Number(value)),
    schema.optional()
  );

export const ServiceQuerySchema = z.object({
  weight_lbs: optionalNumber(z.number().int().nonnegative()),
  weight_oz: optionalNumber(z.number().int().nonnegative()),
  length: optionalNumber(z.number().nonnegative()),
  width: optionalNumber(z.number().nonnegative()),
  height: optionalNumber(z.number().nonnegative()),
});

export const SavedAddressInputSchema = z.object({
  name: z.string().min(1).max(200),
  firstName: z.string().min(1).max(100),
  lastName: z.string().max(100).default(''),
  address: z.string().min(1).max(200),
  address2: z.string().max(200).default(''),
  city: z.string().min(1).max(100),
  state: z.string().length(2),
  zipCode: z.string().min(1).max(10),
  phone: z.string().max(20).default(''),
  isDefault: z.boolean().default(false),
});

export const SavedPackageInputSchema = z.object({
  name: z.string().min(1).max(200),
  length: z.number().nonnegative(),
  width: z.number().nonnegative(),
  height: z.number().nonnegative(),
  weightLbs: z.number().int().nonnegative().default(0),
  weightOz: z.number().int().nonnegative().default(0),
});

export type BulkUpdateRequest = z.infer<typeof BulkUpdateRequestSchema>;
export type BulkDeleteRequest = z.infer<typeof BulkDeleteRequestSchema>;
export type VerifyAddressesRequest = z.infer<typeof VerifyAddressesRequestSchema>;
export type BulkServiceRequest = z.infer<typeof BulkServiceRequestSchema>;
export type PurchaseRequest = z.infer<typeof PurchaseRequestSchema>;
export type ServiceQuery = z.infer<typeof ServiceQuerySchema>;
export type SavedAddressInput = z.input<typeof SavedAddressInputSchema>;
export type SavedPackageInput = z.input<typeof SavedPackageInputSchema>;
