import axios, { AxiosInstance } from 'axios';
import http from 'http';
import https from 'https';
import { EventEmitter } from 'events';
import { parseStringPromise, processors } from 'xml2js';
import type { Config, PunchSettings } from '../utils/config';
import logger from '../utils/logger';
import { NetworkError, ServiceFault, TimeoutError, errorMessage } from '../utils/errors';
import { buildPhotoFileName, buildSwipeInput } from '../utils/identifier';
import { describePunchException, describeSystemError } from '../utils/punch-exceptions';
import type { PunchResult, PunchType, RemotePunchGateway } from '../types/punch';

const SUMMARY_SERVICE = 'Services/MSIWebTraxCheckInSummary.asmx';
const CHECKIN_SERVICE = 'Services/MSIWebTraxCheckIn.asmx';

const CONNECTIVITY_RESTORED = 'connectivity-restored';

type XmlNode = { [key: string]: unknown };

export interface GatewayStatus {
    online: boolean | null;
    lastError: string | null;
    lastSuccessAt: string | null;
}

function isNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(node: unknown, key: string): unknown {
    return isNode(node) ? node[key] : undefined;
}

function text(node: unknown): string | undefined {
    if (typeof node === 'string') {
        const trimmed = node.trim();
        return trimmed.length > 0 ? trimmed : undefined;
    }
    return undefined;
}

function toInt(value: string | undefined): number | null {
    if (value === undefined) return null;
    const parsed = parseInt(value, 10);
    return Number.isNaN(parsed) ? null : parsed;
}

function toPunchType(value: string | undefined): PunchType | null {
    const normalized = value?.toLowerCase();
    return normalized === 'checkin' || normalized === 'checkout' ? normalized : null;
}

/**
 * Client for the remote attendance SOAP service.
 *
 * One call per method; retries belong to the caller. The HTTP client is created
 * on first use and discarded after any transient failure so the next call opens
 * fresh connections.
 */
export class PunchGateway extends EventEmitter implements RemotePunchGateway {
    private client: AxiosInstance | null = null;
    private online: boolean | null = null;
    private lastError: string | null = null;
    private lastSuccessAt: string | null = null;

    constructor(
        private readonly settings: PunchSettings,
        private readonly soap: Config['soap']
    ) {
        super();
    }

    /**
     * Submit one swipe. Resolves with the employee summary, or rejects with
     * NetworkError, TimeoutError or ServiceFault.
     */
    async submitPunch(rawEmployeeId: string, punchTimestamp: Date, departmentOverride?: number): Promise<PunchResult> {
        const operation =
            departmentOverride === undefined ? 'RecordSwipeSummary' : 'RecordSwipeSummaryDepartmentOverride';
        const swipeInput = buildSwipeInput(rawEmployeeId, punchTimestamp, departmentOverride);

        logger.info('PUNCH SEND', { employeeId: rawEmployeeId, punchTimestamp: punchTimestamp.toISOString(), operation });

        const result = await this.call(SUMMARY_SERVICE, operation, `<swipeInput>${this.escapeXml(swipeInput)}</swipeInput>`);
        const info = child(result, 'RecordSwipeReturnInfo');
        if (!isNode(info)) {
            throw this.transient(new NetworkError('Invalid response from server: missing RecordSwipeReturnInfo'));
        }

        const systemErrorCode = text(info.SystemErrorCode);
        if (systemErrorCode !== undefined && systemErrorCode !== '0') {
            const message = describeSystemError(systemErrorCode) ?? `System error ${systemErrorCode}`;
            logger.error('SOAP system error', { employeeId: rawEmployeeId, systemErrorCode, message });
            throw new ServiceFault(message, { systemErrorCode });
        }

        const response: PunchResult = {
            firstName: text(info.FirstName) ?? '',
            lastName: text(info.LastName) ?? '',
            punchType: toPunchType(text(info.PunchType)),
            weeklyHours: this.parseHours(text(child(result, 'CurrentWeeklyHours'))),
            exceptionCode: toInt(text(info.PunchException)),
        };

        const success = text(info.PunchSuccess)?.toLowerCase() === 'true';
        if (!success) {
            const { message } = describePunchException(response.exceptionCode);
            logger.info('PUNCH EXCEPTION', { employeeId: rawEmployeeId, exceptionCode: response.exceptionCode, message });
            throw new ServiceFault(message, { exceptionCode: response.exceptionCode ?? undefined });
        }

        logger.info('PUNCH RESPONSE', {
            employeeId: rawEmployeeId,
            lastName: response.lastName,
            firstName: response.firstName,
            punchType: response.punchType,
            weeklyHours: response.weeklyHours,
        });
        return response;
    }

    /**
     * Upload the punch photo as <imageEmployeeId>_<YYYYMMDD_HHMMSS>.jpg
     */
    async uploadPhoto(imageEmployeeId: string, photoBytes: Buffer, punchTimestamp: Date): Promise<void> {
        const fileName = buildPhotoFileName(imageEmployeeId, punchTimestamp);
        const params =
            `<fileName>${this.escapeXml(fileName)}</fileName>` +
            `<data>${photoBytes.toString('base64')}</data>` +
            `<dir>${this.escapeXml(this.soap.clientId)}</dir>`;

        const result = await this.call(CHECKIN_SERVICE, 'SaveImage', params);

        const systemErrorCode = text(child(result, 'SystemErrorCode'));
        if (systemErrorCode !== undefined && systemErrorCode !== '0') {
            const message = describeSystemError(systemErrorCode) ?? `System error ${systemErrorCode}`;
            logger.error('SaveImage error code', { fileName, systemErrorCode });
            throw new ServiceFault(message, { systemErrorCode });
        }
        if (typeof result === 'string' && result.trim().toLowerCase() === 'false') {
            throw new ServiceFault(`Image ${fileName} was not accepted`);
        }

        logger.info('Photo uploaded', { fileName, bytes: photoBytes.length });
    }

    onConnectivityRestored(listener: () => void): void {
        this.on(CONNECTIVITY_RESTORED, listener);
    }

    getStatus(): GatewayStatus {
        return {
            online: this.online,
            lastError: this.lastError,
            lastSuccessAt: this.lastSuccessAt,
        };
    }

    /**
     * Post one SOAP operation and return its <operation>Result element.
     */
    private async call(servicePath: string, operation: string, params: string): Promise<unknown> {
        const envelope = this.buildEnvelope(operation, params);
        const timeoutMs = this.settings.timeoutSeconds * 1000;
        const started = Date.now();

        let status: number;
        let data: string;
        try {
            const response = await this.getClient().post<string>(servicePath, envelope, {
                headers: { SOAPAction: `"${this.soap.namespace}${operation}"` },
                signal: AbortSignal.timeout(timeoutMs),
            });
            status = response.status;
            data = typeof response.data === 'string' ? response.data : String(response.data);
        } catch (error: unknown) {
            throw this.transient(this.classifyTransportError(error, operation, Date.now() - started));
        }

        let body: unknown;
        try {
            const parsed: unknown = await parseStringPromise(data, {
                explicitArray: false,
                ignoreAttrs: true,
                tagNameProcessors: [processors.stripPrefix],
            });
            body = child(child(parsed, 'Envelope'), 'Body');
        } catch (error: unknown) {
            throw this.transient(
                new NetworkError(`Unparseable ${operation} response (HTTP ${status}): ${errorMessage(error)}`, { cause: error })
            );
        }

        const fault = child(body, 'Fault');
        if (isNode(fault)) {
            const faultCode = text(fault.faultcode) ?? '';
            const faultString = text(fault.faultstring) ?? 'SOAP fault';
            if (faultCode.endsWith('Client')) {
                this.markOnline();
                throw new ServiceFault(faultString);
            }
            throw this.transient(new NetworkError(`${operation} server fault: ${faultString}`));
        }

        if (status < 200 || status >= 300) {
            throw this.transient(new NetworkError(`${operation} failed with HTTP ${status}`));
        }

        const result = child(child(body, `${operation}Response`), `${operation}Result`);
        if (result === undefined) {
            throw this.transient(new NetworkError(`Invalid response from server: missing ${operation}Result`));
        }

        logger.debug(`SOAP ${operation} completed in ${Date.now() - started}ms`);
        this.markOnline();
        return result;
    }

    private getClient(): AxiosInstance {
        if (!this.client) {
            this.client = axios.create({
                baseURL: this.settings.endpoint,
                timeout: this.settings.timeoutSeconds * 1000,
                headers: {
                    'Content-Type': 'text/xml; charset=utf-8',
                },
                responseType: 'text',
                // SOAP faults arrive as HTTP 500 with an envelope
                validateStatus: () => true,
                httpAgent: new http.Agent({ keepAlive: true }),
                httpsAgent: new https.Agent({ keepAlive: true }),
            });
        }
        return this.client;
    }

    private classifyTransportError(error: unknown, operation: string, elapsedMs: number): NetworkError | TimeoutError {
        if (axios.isCancel(error)) {
            return new TimeoutError(`${operation} timed out after ${elapsedMs}ms`, { cause: error });
        }
        if (axios.isAxiosError(error)) {
            if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
                return new TimeoutError(`${operation} timed out after ${elapsedMs}ms`, { cause: error });
            }
            return new NetworkError(`${operation} failed: ${error.code ?? error.message}`, { cause: error });
        }
        return new NetworkError(`${operation} failed: ${errorMessage(error)}`, { cause: error });
    }

    private transient<T extends NetworkError | TimeoutError>(error: T): T {
        this.online = false;
        this.lastError = error.message;
        this.client = null;
        logger.warn('Attendance service unreachable', { error: error.message, code: error.code });
        return error;
    }

    private markOnline(): void {
        const wasOffline = this.online === false;
        this.online = true;
        this.lastError = null;
        this.lastSuccessAt = new Date().toISOString();
        if (wasOffline) {
            logger.info('Attendance service reachable again');
            this.emit(CONNECTIVITY_RESTORED);
        }
    }

    private buildEnvelope(operation: string, params: string): string {
        const ns = this.escapeXml(this.soap.namespace);
        return `<?xml version="1.0" encoding="utf-8"?>
<soap:Envelope xmlns:soap="http://schemas.xmlsoap.org/soap/envelope/">
  <soap:Header>
    <UserCredentials xmlns="${ns}">
      <UserName>${this.escapeXml(this.soap.username)}</UserName>
      <PWD>${this.escapeXml(this.soap.password)}</PWD>
    </UserCredentials>
  </soap:Header>
  <soap:Body>
    <${operation} xmlns="${ns}">${params}</${operation}>
  </soap:Body>
</soap:Envelope>`;
    }

    private parseHours(value: string | undefined): number | null {
        if (value === undefined) return null;
        const hours = Number(value);
        return Number.isFinite(hours) ? hours : null;
    }

    /**
     * Escape XML special characters
     */
    private escapeXml(unsafe: string): string {
        return unsafe
            .replace(/&/g, '&amp;')
            .replace(/</g, '&lt;')
            .replace(/>/g, '&gt;')
            .replace(/"/g, '&quot;')
            .replace(/'/g, '&apos;');
    }
}
