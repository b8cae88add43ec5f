import { Logger, LoggerService } from '@nestjs/common';
import { UnresolvedReason } from '../domain/enums';
import {
  CatalogCustomAttributeValue,
  CatalogObject,
  OrderLineItem,
  PaymentProviderAdapter,
  ProviderRequestOptions,
  SlotResolution,
} from '../interfaces';

/**
 * Catalog Resolver - recovers the slot label a line item was sold from.
 *
 * The slot is encoded as a selection-type custom attribute on the catalog
 * item (or variation): the attribute value holds a selection uid, and the
 * attribute definition maps that uid to a name. The name is the slot label.
 *
 * Resolution fails closed: any missing link yields `found: false` and the
 * caller skips the item. Provider failures are folded into LOOKUP_FAILED;
 * `resolveSlot` never rejects.
 */
export class CatalogResolver {
  constructor(
    private readonly provider: PaymentProviderAdapter,
    private readonly logger: LoggerService = new Logger(CatalogResolver.name),
  ) {}

  async resolveSlot(
    lineItem: OrderLineItem,
    options: ProviderRequestOptions = {},
  ): Promise<SlotResolution> {
    const catalogObjectId = lineItem.catalogObjectId || lineItem.uid;
    if (!catalogObjectId) {
      return this.unresolved(
        UnresolvedReason.NO_CATALOG_REFERENCE,
        'line item has no catalog object id or uid',
      );
    }

    try {
      const object = await this.fetchOne(catalogObjectId, options);
      if (!object || (object.kind !== 'item' && object.kind !== 'item_variation')) {
        return this.unresolved(
          UnresolvedReason.OBJECT_NOT_FOUND,
          object
            ? `catalog object ${catalogObjectId} is not an item or item variation`
            : `catalog object not found: ${catalogObjectId}`,
          catalogObjectId,
        );
      }

      const attribute = this.pickAttribute(object.customAttributeValues);
      if (!attribute) {
        return this.unresolved(
          UnresolvedReason.NO_CUSTOM_ATTRIBUTES,
          `no custom attributes found on ${catalogObjectId}`,
          catalogObjectId,
        );
      }

      const selectionUid = attribute.selectionUidValues[0];
      if (!selectionUid) {
        return this.unresolved(
          UnresolvedReason.NO_SELECTION_VALUE,
          `no selection uid values found on ${catalogObjectId}`,
          catalogObjectId,
        );
      }

      if (!attribute.definitionId) {
        return this.unresolved(
          UnresolvedReason.DEFINITION_NOT_FOUND,
          `custom attribute on ${catalogObjectId} has no definition id`,
          catalogObjectId,
        );
      }

      const definition = await this.fetchOne(attribute.definitionId, options);
      if (!definition || definition.kind !== 'custom_attribute_definition') {
        return this.unresolved(
          UnresolvedReason.DEFINITION_NOT_FOUND,
          `definition object not found: ${attribute.definitionId}`,
          catalogObjectId,
        );
      }

      const selection = definition.allowedSelections.find(
        (candidate) => candidate.uid === selectionUid && !!candidate.name,
      );
      if (!selection?.name) {
        return this.unresolved(
          UnresolvedReason.SELECTION_NOT_ALLOWED,
          `selection uid ${selectionUid} not found in definition ${attribute.definitionId}`,
          catalogObjectId,
        );
      }

      return { found: true, slotId: selection.name, catalogObjectId };
    } catch (error) {
      this.logger.error(
        `Catalog lookup for ${catalogObjectId} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return this.unresolved(
        UnresolvedReason.LOOKUP_FAILED,
        error instanceof Error ? error.message : String(error),
        catalogObjectId,
      );
    }
  }

  /**
   * The schema is expected to carry a single slot attribute. When several are
   * present the entry with the lowest key wins, so the choice does not depend
   * on the order the provider serialized them in.
   */
  private pickAttribute(
    values: Record<string, CatalogCustomAttributeValue>,
  ): CatalogCustomAttributeValue | undefined {
    const keys = Object.keys(values).sort();
    if (keys.length > 1) {
      this.logger.warn(
        `Multiple custom attributes (${keys.join(', ')}); using ${keys[0]}`,
      );
    }
    return keys.length > 0 ? values[keys[0]] : undefined;
  }

  private async fetchOne(
    objectId: string,
    options: ProviderRequestOptions,
  ): Promise<CatalogObject | undefined> {
    const objects = await this.provider.batchRetrieveCatalogObjects(
      [objectId],
      options,
    );
    return objects.find((object) => object.id === objectId);
  }

  private unresolved(
    reason: UnresolvedReason,
    detail: string,
    catalogObjectId?: string,
  ): SlotResolution {
    return { found: false, reason, detail, catalogObjectId };
  }
}
