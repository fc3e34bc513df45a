/**
 * User-facing error messages shared by the HTTP layer.
 */

export const BACKEND_ERROR_MESSAGE =
  'Tuvimos un inconveniente momentaneo. Intenta nuevamente en un momento.';

export const INVALID_PAYLOAD_MESSAGE = 'Payload invalido.';

export const NO_SIZES_SELECTED_MESSAGE = 'Por favor selecciona al menos una talla.';

export const ARTIFACT_NOT_FOUND_MESSAGE = 'PDF not found';

export const CATALOG_UNAVAILABLE_MESSAGE =
  'Ahora mismo no puedo consultar el inventario. Intenta nuevamente en unos minutos.';
