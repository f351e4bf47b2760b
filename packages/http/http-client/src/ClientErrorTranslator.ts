import {
    ProtocolError,
    HttpError,
    HttpBadRequestError,
    HttpVendorError,
    HttpUnauthorizedError,
    HttpForbiddenError,
    HttpNotFoundError,
    HttpTimeoutError,
    HttpInternalServerError,
    HttpBadGatewayError,
    HttpGatewayTimeoutError,
    isPlainRecord,
} from '@restbind/http-api';

/** Status line of the failed response. */
export interface StatusLine {
    status: number;
    statusText: string;
}

function optionalString(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

/**
 * ClientErrorTranslator - Translates HTTP error responses to HttpError exceptions.
 *
 * Servers may describe the failure with a JSON body:
 * `{ message, subType, field, guiAlertMessage, waitSeconds }`.
 * Every field is optional; a missing or non-JSON body falls back to the status text.
 */
export class ClientErrorTranslator {
    /**
     * Reads the optional ProtocolError body of a failed response.
     */
    static readProtocolError(bodyText: string): ProtocolError {
        const protocolError = new ProtocolError();
        if (!bodyText.trim().startsWith('{')) {
            return protocolError;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(bodyText);
        } catch (err: unknown) {
            //const error = toError(err);
            // a truncated or foreign error page carries no details
            return protocolError;
        }
        if (!isPlainRecord(parsed)) {
            return protocolError;
        }

        protocolError.message = optionalString(parsed.message);
        protocolError.subType = optionalString(parsed.subType);
        protocolError.field = optionalString(parsed.field);
        protocolError.guiAlertMessage = optionalString(parsed.guiAlertMessage);
        protocolError.waitSeconds = typeof parsed.waitSeconds === 'number' ? parsed.waitSeconds : undefined;
        return protocolError;
    }

    /**
     * Reconstruct the HttpError subclass matching the status code.
     *
     * Maps HTTP status codes to error types:
     * - 400 → HttpBadRequestError (with field, guiAlertMessage)
     * - 401 → HttpUnauthorizedError
     * - 403 → HttpForbiddenError
     * - 404 → HttpNotFoundError
     * - 408 → HttpTimeoutError
     * - 500 → HttpInternalServerError
     * - 502 → HttpBadGatewayError
     * - 504 → HttpGatewayTimeoutError
     * - 598 → HttpVendorError (with waitSeconds) - custom status code
     * - other → generic HttpError
     */
    static translateError(response: StatusLine, protocolError: ProtocolError): HttpError {
        const statusCode = response.status;
        const message = protocolError.message || response.statusText || 'Unknown error';
        const subType = protocolError.subType;

        switch (statusCode) {
            case 400:
                return new HttpBadRequestError(message, protocolError.field, protocolError.guiAlertMessage);

            case 401:
                return new HttpUnauthorizedError(message, subType);

            case 403:
                return new HttpForbiddenError(message);

            case 404:
                return new HttpNotFoundError(message);

            case 408:
                return new HttpTimeoutError(message);

            case 500:
                return new HttpInternalServerError(message);

            case 502:
                return new HttpBadGatewayError(message);

            case 504:
                return new HttpGatewayTimeoutError(message);

            case 598:
                return new HttpVendorError(message, protocolError.waitSeconds);

            default:
                return new HttpError(message, statusCode, subType);
        }
    }
}
