import {
  CatalogAllowedSelection,
  CatalogCustomAttributeValue,
  CatalogObject,
  OrderLineItem,
  ProviderOrder,
} from '../../../core/interfaces';

/**
 * Mapping from Square's snake_case JSON onto the pipeline's types.
 * Response bodies are untrusted: every field is narrowed before use and
 * anything of an unexpected shape is treated as absent.
 */

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function objects(value: unknown): JsonObject[] {
  return Array.isArray(value) ? value.filter(isObject) : [];
}

export function mapOrder(body: unknown, orderId: string): ProviderOrder | undefined {
  const order = isObject(body) ? body.order : undefined;
  if (!isObject(order)) {
    return undefined;
  }

  return {
    id: str(order.id) ?? orderId,
    state: str(order.state),
    lineItems: objects(order.line_items).map(mapLineItem),
  };
}

function mapLineItem(item: JsonObject): OrderLineItem {
  return {
    uid: str(item.uid),
    catalogObjectId: str(item.catalog_object_id),
    name: str(item.name),
    quantity: str(item.quantity),
  };
}

export function mapCatalogObjects(body: unknown): CatalogObject[] {
  if (!isObject(body)) {
    return [];
  }
  return objects(body.objects).flatMap((object) => {
    const mapped = mapCatalogObject(object);
    return mapped ? [mapped] : [];
  });
}

function mapCatalogObject(object: JsonObject): CatalogObject | undefined {
  const id = str(object.id);
  const type = str(object.type);
  if (!id || !type) {
    return undefined;
  }

  switch (type) {
    case 'ITEM':
    case 'ITEM_VARIATION':
      return {
        kind: type === 'ITEM' ? 'item' : 'item_variation',
        id,
        customAttributeValues: mapCustomAttributeValues(
          object.custom_attribute_values,
        ),
      };
    case 'CUSTOM_ATTRIBUTE_DEFINITION': {
      const data = isObject(object.custom_attribute_definition_data)
        ? object.custom_attribute_definition_data
        : {};
      const selectionConfig = isObject(data.selection_config)
        ? data.selection_config
        : {};
      return {
        kind: 'custom_attribute_definition',
        id,
        name: str(data.name),
        allowedSelections: objects(selectionConfig.allowed_selections).map(
          (selection): CatalogAllowedSelection => ({
            uid: str(selection.uid),
            name: str(selection.name),
          }),
        ),
      };
    }
    default:
      return { kind: 'other', id, type };
  }
}

function mapCustomAttributeValues(
  value: unknown,
): Record<string, CatalogCustomAttributeValue> {
  const mapped: Record<string, CatalogCustomAttributeValue> = {};
  if (!isObject(value)) {
    return mapped;
  }

  for (const [key, attribute] of Object.entries(value)) {
    if (!isObject(attribute)) {
      continue;
    }
    mapped[key] = {
      name: str(attribute.name),
      key: str(attribute.key),
      definitionId: str(attribute.custom_attribute_definition_id),
      selectionUidValues: Array.isArray(attribute.selection_uid_values)
        ? attribute.selection_uid_values.filter(
            (uid): uid is string => typeof uid === 'string',
          )
        : [],
    };
  }
  return mapped;
}

/**
 * First error detail from a Square error body, if any
 */
export function errorDetail(body: unknown): string | undefined {
  if (!isObject(body)) {
    return undefined;
  }
  const [first] = objects(body.errors);
  return first ? str(first.detail) ?? str(first.code) : undefined;
}
