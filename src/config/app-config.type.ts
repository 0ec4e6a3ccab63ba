export type AppConfig = {
  nodeEnv: string;
  name: string;
  port: number;
  apiPrefix: string;
  uploadMaxFileSizeMb: number;
  swaggerEnabled: boolean;
};
