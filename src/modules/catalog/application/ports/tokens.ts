export const PG_POOL = Symbol('PG_POOL');
export const CLOCK = Symbol('CLOCK');
export const CATALOG_SOURCE_PORT = Symbol('CATALOG_SOURCE_PORT');
export const IMAGE_ORIGIN_PORT = Symbol('IMAGE_ORIGIN_PORT');
export const IMAGE_DECODER_PORT = Symbol('IMAGE_DECODER_PORT');
export const CATALOG_PDF_WRITER_PORT = Symbol('CATALOG_PDF_WRITER_PORT');
export const ARTIFACT_STORE_PORT = Symbol('ARTIFACT_STORE_PORT');
export const METRICS_PORT = Symbol('METRICS_PORT');
