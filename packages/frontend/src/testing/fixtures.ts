/**
 * Descriptor fixtures shared by the package tests
 */

import type { DescriptorSet, FileDescriptor } from "../descriptor/schema.js";
import {
  createRegistry,
  type Registry,
  type RegistryOptions,
} from "../descriptor/registry.js";
import { formatDiagnostic } from "../types/diagnostic.js";

export const fieldMaskFile: FileDescriptor = {
  name: "google/protobuf/field_mask.proto",
  package: "google.protobuf",
  targetPackage: "example.com/gen/fieldmaskpb;fieldmaskpb",
  messages: [
    {
      name: "FieldMask",
      fields: [{ name: "paths", number: 1, type: "string", repeated: true }],
    },
  ],
};

export const typesFile: FileDescriptor = {
  name: "example/types/v1/types.proto",
  package: "example.types.v1",
  targetPackage: "example.com/gen/types/v1;typesv1",
  enums: [{ name: "Kind", values: ["KIND_UNSPECIFIED", "KIND_BOOK"] }],
  messages: [
    {
      name: "Labels",
      fields: [{ name: "key", number: 1, type: "string" }],
      enums: [{ name: "Color", values: ["COLOR_UNSPECIFIED", "COLOR_RED"] }],
    },
  ],
};

export const itemsFile: FileDescriptor = {
  name: "example/v1/items.proto",
  package: "example.v1",
  targetPackage: "example.com/gen/items/v1;itemsv1",
  dependencies: [typesFile.name, fieldMaskFile.name],
  messages: [
    {
      name: "GetItemRequest",
      fields: [
        { name: "id", number: 1, type: "string" },
        { name: "kind", number: 2, type: "enum", typeName: ".example.types.v1.Kind" },
      ],
    },
    {
      name: "Item",
      fields: [
        { name: "id", number: 1, type: "string" },
        { name: "title", number: 2, type: "string" },
      ],
    },
    {
      name: "UpdateItemRequest",
      fields: [
        { name: "item", number: 1, type: "message", typeName: "Item" },
        {
          name: "update_mask",
          number: 2,
          type: "message",
          typeName: ".google.protobuf.FieldMask",
        },
      ],
    },
  ],
  services: [
    {
      name: "ItemService",
      methods: [
        {
          name: "GetItem",
          inputType: "GetItemRequest",
          outputType: "Item",
          http: { get: "/v1/items/{id}" },
        },
        {
          name: "ListByKind",
          inputType: "GetItemRequest",
          outputType: "Item",
          http: { get: "/v1/kinds/{kind}/items" },
        },
        {
          name: "UpdateItem",
          inputType: "UpdateItemRequest",
          outputType: "Item",
          http: { patch: "/v1/items/{item.id}", body: "item" },
        },
        {
          name: "Ping",
          inputType: "GetItemRequest",
          outputType: "Item",
        },
      ],
    },
  ],
};

export const ordersFile: FileDescriptor = {
  name: "example/v1/orders.proto",
  package: "example.v1",
  targetPackage: "example.com/gen/orders/v1;ordersv1",
  dependencies: [itemsFile.name],
  messages: [{ name: "Order", fields: [{ name: "id", number: 1, type: "string" }] }],
  services: [
    {
      name: "OrderService",
      methods: [
        {
          name: "CreateOrder",
          inputType: "GetItemRequest",
          outputType: "Order",
          http: { post: "/v1/orders", body: "*" },
        },
      ],
    },
  ],
};

export const internalFile: FileDescriptor = {
  name: "example/v1/internal.proto",
  package: "example.v1",
  targetPackage: "example.com/gen/items/v1;itemsv1",
  services: [
    {
      name: "InternalService",
      methods: [
        { name: "Sync", inputType: "GetItemRequest", outputType: "Item" },
      ],
    },
  ],
};

export const fixtureSet = (
  overrides: Partial<DescriptorSet> = {}
): DescriptorSet => ({
  files: [fieldMaskFile, typesFile, itemsFile, ordersFile, internalFile],
  ...overrides,
});

/**
 * Build a registry or fail the test with the diagnostics
 */
export const buildRegistry = (
  set: DescriptorSet = fixtureSet(),
  options: RegistryOptions = {}
): Registry => {
  const result = createRegistry(set, options);
  if (!result.ok) {
    throw new Error(result.error.map(formatDiagnostic).join("\n"));
  }
  return result.value;
};

/**
 * Look up a file the test expects to exist
 */
export const fileNamed = (registry: Registry, name: string) => {
  const result = registry.lookupFile(name);
  if (!result.ok) {
    throw new Error(formatDiagnostic(result.error));
  }
  return result.value;
};
