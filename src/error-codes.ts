export const UNSUPPORTED_ALGORITHM = "ERR_UNSUPPORTED_ALGORITHM";
export const INVALID_ALGORITHM = "ERR_INVALID_ALGORITHM";
export const INVALID_CODE = "ERR_INVALID_CODE";
export const TRUNCATED_INPUT = "ERR_TRUNCATED_INPUT";
export const INVALID_ENCODING = "ERR_INVALID_ENCODING";
export const MISSING_FIELD = "ERR_MISSING_FIELD";
export const DUPLICATE_FIELD = "ERR_DUPLICATE_FIELD";
export const UNEXPECTED_FIELD = "ERR_UNEXPECTED_FIELD";
export const INVALID_RECORD = "ERR_INVALID_RECORD";
