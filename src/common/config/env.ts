import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

/**
 * 环境变量加载器
 */
export class EnvLoader {
  private static initialized = false;

  /**
   * 初始化环境变量（只加载找到的第一个 .env 文件，已存在的变量不会被覆盖）
   */
  public static initialize(cwd: string = process.cwd()): void {
    if (this.initialized) {
      return;
    }

    const envPaths = [
      path.join(cwd, '.env.local'),
      path.join(cwd, '.env')
    ];

    for (const envPath of envPaths) {
      if (!fs.existsSync(envPath)) {
        continue;
      }
      const result = dotenv.config({ path: envPath });
      if (result.error) {
        throw new Error(`Failed to load environment file ${envPath}: ${result.error.message}`);
      }
      break;
    }

    this.initialized = true;
  }

  /**
   * 重置初始化状态（测试用）
   */
  public static reset(): void {
    this.initialized = false;
  }

  public static get(key: string, defaultValue?: string): string | undefined {
    this.initialize();
    const value = process.env[key];
    return value === undefined || value === '' ? defaultValue : value;
  }

  /**
   * 获取数值型环境变量，无法解析时抛出错误
   */
  public static getNumber(key: string, defaultValue?: number): number | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return defaultValue;
    }
    const num = Number(value);
    if (Number.isNaN(num)) {
      throw new Error(`Environment variable ${key} is not a number: ${value}`);
    }
    return num;
  }

  public static getBoolean(key: string, defaultValue?: boolean): boolean | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return defaultValue;
    }
    const lowerValue = value.toLowerCase();
    return lowerValue === 'true' || lowerValue === '1' || lowerValue === 'yes';
  }

  public static getArray(key: string, defaultValue?: string[]): string[] | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return defaultValue;
    }
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  }
}

export const env = {
  get: EnvLoader.get.bind(EnvLoader),
  getNumber: EnvLoader.getNumber.bind(EnvLoader),
  getBoolean: EnvLoader.getBoolean.bind(EnvLoader),
  getArray: EnvLoader.getArray.bind(EnvLoader)
};
