import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { LogEntry, LogSeverity } from '../../utils/types';
import { SocketGateway } from '../socket-gateway/socket.gateway';

const DEFAULT_CAPACITY = 500;

/**
 * In-memory log shown in the UI's system log panel. Every entry is also
 * written to the process log.
 */
@Injectable()
export class SystemLogService {
    private readonly logger = new Logger('SystemLog');
    private log: LogEntry[] = [];
    private capacity = DEFAULT_CAPACITY;

    constructor(private readonly socketGateway: SocketGateway) { }

    info(message: string): LogEntry {
        return this.append('info', message);
    }

    warn(message: string): LogEntry {
        return this.append('warning', message);
    }

    error(message: string): LogEntry {
        return this.append('error', message);
    }

    entries(limit?: number): LogEntry[] {
        if (limit === undefined || limit >= this.log.length) {
            return [...this.log];
        }
        return limit <= 0 ? [] : this.log.slice(-limit);
    }

    clear() {
        this.log = [];
        this.socketGateway.broadcast('log.cleared', {});
    }

    resize(capacity: number) {
        this.capacity = Math.max(1, Math.floor(capacity));
        this.evict();
    }

    private append(severity: LogSeverity, message: string): LogEntry {
        const entry: LogEntry = {
            id: uuidv4(),
            timestamp: new Date().toISOString(),
            severity,
            message,
        };
        this.log.push(entry);
        this.evict();

        switch (severity) {
            case 'error':
                this.logger.error(message);
                break;
            case 'warning':
                this.logger.warn(message);
                break;
            default:
                this.logger.log(message);
        }
        this.socketGateway.broadcast('log.entry', entry);
        return entry;
    }

    private evict() {
        if (this.log.length > this.capacity) {
            this.log.splice(0, this.log.length - this.capacity);
        }
    }
}
