import { Injectable } from '@nestjs/common';
import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';

/**
 * Shared axios client for calls to neighbouring services (LMS, payment
 * gateway service). Error responses are returned, not thrown, so callers can
 * read the error body. Per-request config may override the default timeout.
 */
@Injectable()
export class HttpService {
  private axiosInstance: AxiosInstance;

  constructor() {
    this.axiosInstance = axios.create({
      timeout: 10000,
      headers: {
        'Content-Type': 'application/json',
      },
      validateStatus: function (status) {
        return status < 500;
      },
    });
  }

  async get<T>(url: string, config?: AxiosRequestConfig): Promise<AxiosResponse<T>> {
    return this.axiosInstance.get<T>(url, config);
  }

  async post<T>(
    url: string,
    data?: unknown,
    config?: AxiosRequestConfig,
  ): Promise<AxiosResponse<T>> {
    try {
      return await this.axiosInstance.post<T>(url, data, config);
    } catch (error) {
      if (axios.isAxiosError<T>(error) && error.response) {
        return error.response;
      }
      throw error;
    }
  }
}
