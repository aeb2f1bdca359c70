import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';

/**
 * HTTP client abstraction interface for testability
 */
export interface IHttpClient {
    request<T = unknown>(config: AxiosRequestConfig): Promise<AxiosResponse<T>>;
}

/**
 * Default implementation using axios. Non-2xx responses reject.
 */
export class AxiosHttpClient implements IHttpClient {
    private readonly instance: AxiosInstance;

    constructor(instance: AxiosInstance = axios.create({ headers: { 'User-Agent': 'discord-updater' } })) {
        this.instance = instance;
    }

    async request<T = unknown>(config: AxiosRequestConfig): Promise<AxiosResponse<T>> {
        return this.instance.request<T>(config);
    }
}
