import axios from 'axios';
import type { AxiosInstance } from 'axios';

export const createHttpClient = (baseURL?: string, timeout = 10000): AxiosInstance => {
  return axios.create({
    baseURL,
    timeout,
    headers: {
      'Content-Type': 'application/json'
    }
  });
};
