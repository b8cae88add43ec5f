/**
 * Why a line item could not be mapped to a slot.
 * Each value is a broken link in the catalog -> definition chain.
 */
export enum UnresolvedReason {
  /**
   * Line item carries neither a catalog object id nor a uid
   */
  NO_CATALOG_REFERENCE = 'no_catalog_reference',

  /**
   * Catalog object missing, or neither an item nor an item variation
   */
  OBJECT_NOT_FOUND = 'object_not_found',

  /**
   * Object has no custom attribute values
   */
  NO_CUSTOM_ATTRIBUTES = 'no_custom_attributes',

  /**
   * Chosen attribute value has no selection uid
   */
  NO_SELECTION_VALUE = 'no_selection_value',

  /**
   * Definition id missing, or the definition object could not be found
   */
  DEFINITION_NOT_FOUND = 'definition_not_found',

  /**
   * Selection uid is not among the definition's allowed selections
   */
  SELECTION_NOT_ALLOWED = 'selection_not_allowed',

  /**
   * Provider call failed (non-200, network error, timeout)
   */
  LOOKUP_FAILED = 'lookup_failed',
}
