export type DatadogOptions = {
  hostname?: string;
  service?: string;
  env?: string;
};

export type LogMessage = Record<string, unknown>;

export class Datadog {
  private hostname: string;
  private service: string;
  private env: string;

  constructor(
    private apiKey: string,
    {
      hostname = "node",
      service = "urlencoded-params",
      env = "prod",
    }: DatadogOptions = {},
  ) {
    this.hostname = hostname;
    this.service = service;
    this.env = env;
  }

  async log(messages: LogMessage[]) {
    if (messages.length === 0) {
      return;
    }

    const url = `https://http-intake.logs.datadoghq.com/api/v2/logs`;
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "DD-API-KEY": this.apiKey,
      },
      body: JSON.stringify(
        messages.map((message) => ({
          message,
          hostname: this.hostname,
          service: this.service,
          ddtags: `env:${this.env}`,
        })),
      ),
    });

    if (!response.ok) {
      throw new Error(`datadog intake responded with ${response.status}`);
    }
  }
}
