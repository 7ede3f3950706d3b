import axios, { AxiosInstance } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { AppConfig } from '../config/config';
import DownloadError, { errorMessage } from '../models/download-error';
import { ActiveSession, Credentials } from '../models/provider.model';
import { Logger } from './logger.service';

interface LoginResponse {
  access_token?: string;
  username?: string;
}

export class SessionService {
  private readonly deviceId = uuidv4();

  constructor(
    private logger: Logger,
    private config: Pick<AppConfig, 'authUrl' | 'requestTimeoutMs'>,
    private http: AxiosInstance = axios.create()
  ) {}

  /**
   * Log in and return the session every catalog request is made with
   */
  public async connect(credentials: Credentials): Promise<ActiveSession> {
    this.logger.debug(`Logging in as ${credentials.username} (device ${this.deviceId})`);

    let data: LoginResponse;
    try {
      const response = await this.http.post<LoginResponse>(
        this.config.authUrl,
        {
          username: credentials.username,
          password: credentials.password,
          device_id: this.deviceId
        },
        { timeout: this.config.requestTimeoutMs }
      );
      data = response.data;
    } catch (error) {
      throw new DownloadError('AUTH', `cannot log in: ${errorMessage(error).toLowerCase()}`, { cause: error });
    }

    if (!data.access_token) {
      throw new DownloadError('AUTH', 'cannot log in: no access token in login response');
    }

    return {
      username: data.username ?? credentials.username,
      accessToken: data.access_token,
      deviceId: this.deviceId
    };
  }
}
