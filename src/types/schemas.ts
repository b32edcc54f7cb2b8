import { z } from "zod";
import type { SettingsTree, SettingsValue } from "../core/settings-tree";

export const SettingsValueSchema: z.ZodType<SettingsValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.record(SettingsValueSchema),
  ])
);

export const SettingsTreeSchema: z.ZodType<SettingsTree> = z.record(SettingsValueSchema);

export const HookEnvironmentSchema = z.object({
  SNAP: z.string().min(1),
  SNAP_COMMON: z.string().min(1),
  SNAP_DATA: z.string().min(1),
  SNAP_INSTANCE_NAME: z.string().min(1).default("openstack-hypervisor"),
  HYPERVISOR_LOG_LEVEL: z.string().optional(),
});

export const CidrSchema = z.string().regex(/^(\d{1,3}\.){3}\d{1,3}\/\d{1,2}$/);

// OVSDB wire values as printed by `ovs-vsctl --format json`
export const OvsdbAtomSchema = z.union([z.string(), z.number(), z.boolean()]);

export const OvsdbUuidSchema = z.tuple([z.literal("uuid"), z.string()]);

export const OvsdbSetSchema = z.tuple([
  z.literal("set"),
  z.array(z.union([OvsdbAtomSchema, OvsdbUuidSchema])),
]);

export const OvsdbMapSchema = z.tuple([
  z.literal("map"),
  z.array(z.tuple([OvsdbAtomSchema, OvsdbAtomSchema])),
]);

export const OvsdbTableSchema = z.object({
  headings: z.array(z.string()),
  data: z.array(z.array(z.unknown())),
});

const ovsdbMember = (member: z.infer<typeof OvsdbSetSchema>[1][number]): string =>
  Array.isArray(member) ? member[1] : String(member);

export const OvsdbRefsSchema = z.union([
  OvsdbUuidSchema.transform(([, uuid]) => [uuid]),
  OvsdbSetSchema.transform(([, members]) => members.map(ovsdbMember)),
]);

export const OvsdbStringMapSchema = OvsdbMapSchema.transform(([, pairs]) =>
  Object.fromEntries(pairs.map(([key, value]) => [String(key), String(value)]))
);

export const OvsdbPortRowSchema = z.object({
  _uuid: OvsdbUuidSchema.transform(([, uuid]) => uuid).optional(),
  name: z.string(),
  external_ids: OvsdbStringMapSchema.default(["map", []]),
  interfaces: OvsdbRefsSchema.default(["set", []]),
});

export type OvsdbTable = z.infer<typeof OvsdbTableSchema>;

// Validation helpers
export const validateSettingsSafe = (data: unknown) => {
  return SettingsTreeSchema.safeParse(data);
};
