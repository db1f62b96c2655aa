import { Logger, LogLevel, GlobalLoggerManager, createLogger, createModuleLogger, getLogger, parseLogLevel, type LogEntry, type LoggerConfig } from '../Logger';
import { LoggerFactory } from '../LoggerFactory';
import { existsSync, mkdtempSync, readFileSync, readdirSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { rimraf } from 'rimraf';

function readEntries(logDir: string): LogEntry[] {
  const [file] = readdirSync(logDir);
  return readFileSync(join(logDir, file), 'utf8')
    .trim()
    .split('\n')
    .map((line): LogEntry => JSON.parse(line));
}

describe('Logger', () => {
  let testLogDir: string;

  beforeEach(() => {
    testLogDir = mkdtempSync(join(tmpdir(), 'logger-test-'));
  });

  afterEach(() => {
    rimraf.sync(testLogDir);
  });

  function fileLogger(config: Partial<LoggerConfig> = {}): Logger {
    return new Logger({ level: LogLevel.DEBUG, console: false, file: true, logDir: testLogDir, ...config });
  }

  describe('基础功能', () => {
    test('应该写入按日期命名的 JSONL 文件', () => {
      fileLogger().info('信息消息');

      const logFiles = readdirSync(testLogDir);
      expect(logFiles).toEqual([`app-${new Date().toISOString().slice(0, 10)}.jsonl`]);
    });

    test('应该根据日志级别过滤消息', () => {
      const testLogger = fileLogger({ level: LogLevel.WARN });

      testLogger.error('错误消息'); // 应该记录
      testLogger.warn('警告消息'); // 应该记录
      testLogger.info('信息消息'); // 不应该记录
      testLogger.debug('调试消息'); // 不应该记录

      expect(readEntries(testLogDir).map(e => e.level)).toEqual([LogLevel.ERROR, LogLevel.WARN]);
    });

    test('关闭文件输出时不创建日志目录', () => {
      const logDir = join(testLogDir, 'unused');
      new Logger({ level: LogLevel.INFO, console: false, file: false, logDir }).info('消息');

      expect(existsSync(logDir)).toBe(false);
    });
  });

  describe('结构化日志', () => {
    test('应该支持上下文数据', () => {
      const context = { requestId: 'req-1', attempt: 2 };

      fileLogger().info('请求完成', context);

      const [entry] = readEntries(testLogDir);
      expect(entry.message).toBe('请求完成');
      expect(entry.context).toEqual(context);
      expect(entry.level).toBe(LogLevel.INFO);
      expect(typeof entry.timestamp).toBe('string');
    });

    test('应该支持错误对象', () => {
      fileLogger().error('发生错误', { operation: 'test' }, new Error('测试错误'));

      const [entry] = readEntries(testLogDir);
      expect(entry.error).toEqual({
        name: 'Error',
        message: '测试错误',
        stack: expect.stringContaining('Error: 测试错误'),
      });
      expect(entry.context).toEqual({ operation: 'test' });
    });
  });

  describe('模块专用日志器', () => {
    test('子日志器在 context 中记录模块名', () => {
      fileLogger({ level: LogLevel.INFO }).child('registry').info('模块消息', { key: 'Config' });

      const [entry] = readEntries(testLogDir);
      expect(entry.context).toEqual({ key: 'Config', module: 'registry' });
    });

    test('应该支持便捷函数创建模块日志器', () => {
      createModuleLogger('loader', { level: LogLevel.INFO, console: false, file: true, logDir: testLogDir }).warn('加载缓慢', { ms: 456 });

      const [entry] = readEntries(testLogDir);
      expect(entry.context).toEqual({ ms: 456, module: 'loader' });
      expect(entry.level).toBe(LogLevel.WARN);
    });
  });

  describe('控制台格式', () => {
    test('无颜色时输出纯文本行，模块名单独显示', () => {
      const testLogger = new Logger({ level: LogLevel.INFO, console: false, file: false, colors: false });
      const entry: LogEntry = {
        timestamp: new Date(2024, 0, 2, 3, 4, 5).toISOString(),
        level: LogLevel.INFO,
        message: 'hello',
        context: { module: 'db', id: 1 },
      };

      expect(testLogger.formatConsoleLine(entry)).toBe('[2024-01-02 03:04:05] [INFO] [db] hello {"id":1}');
    });

    test('没有上下文时不输出多余内容', () => {
      const testLogger = new Logger({ level: LogLevel.INFO, console: false, file: false, colors: false });
      const entry: LogEntry = {
        timestamp: new Date(2024, 11, 31, 23, 59, 0).toISOString(),
        level: LogLevel.WARN,
        message: 'careful',
      };

      expect(testLogger.formatConsoleLine(entry)).toBe('[2024-12-31 23:59:00] [WARN] careful');
    });

    test('控制台输出按级别选择输出方法', () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
      try {
        new Logger({ level: LogLevel.INFO, console: true, file: false, colors: false }).warn('注意');
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn.mock.calls[0][0]).toMatch(/\[WARN\] 注意$/);
      } finally {
        warn.mockRestore();
      }
    });
  });

  describe('日志轮转', () => {
    test('超过文件大小限制时创建新文件', () => {
      const testLogger = fileLogger({ level: LogLevel.INFO, maxFileSize: 100, maxFiles: 3 });

      for (let i = 0; i < 20; i++) {
        testLogger.info(`消息 ${i}`, { data: 'x'.repeat(30) });
      }

      const logFiles = readdirSync(testLogDir).filter(file => file.endsWith('.jsonl'));
      expect(logFiles.length).toBeGreaterThan(1);
    });

    test('应该清理旧日志文件', () => {
      const testLogger = fileLogger({ level: LogLevel.INFO, maxFileSize: 40, maxFiles: 2 });

      for (let i = 0; i < 50; i++) {
        testLogger.info(`消息 ${i}`, { data: 'x'.repeat(20) });
      }

      // 清理发生在切换文件之前，最多 maxFiles + 1 个文件
      const logFiles = readdirSync(testLogDir).filter(file => file.endsWith('.jsonl'));
      expect(logFiles.length).toBeLessThanOrEqual(3);
    });
  });

  describe('配置管理', () => {
    test('应该支持配置更新', () => {
      const testLogger = fileLogger({ level: LogLevel.WARN });

      testLogger.info('不应该记录这条消息');
      testLogger.updateConfig({ level: LogLevel.DEBUG });
      testLogger.info('应该记录这条消息');

      expect(readEntries(testLogDir).map(e => e.message)).toEqual(['应该记录这条消息']);
      expect(testLogger.getLevel()).toBe(LogLevel.DEBUG);
    });

    test('parseLogLevel 不区分大小写，未知级别回退到 INFO', () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
      try {
        expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
        expect(parseLogLevel('warn')).toBe(LogLevel.WARN);
        expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
        expect(warn).toHaveBeenCalledWith('未知的日志级别: verbose，使用默认级别 INFO');
      } finally {
        warn.mockRestore();
      }
    });

    test('LoggerFactory 将 [logging] 配置段转换为日志配置', () => {
      const factory = LoggerFactory.fromSection({
        level: 'error',
        console: false,
        file: true,
        colors: false,
        max_file_size: 1024,
        max_files: 2,
        log_dir: testLogDir,
      });

      const testLogger = factory.createModuleLogger('factory');
      testLogger.warn('被过滤');
      testLogger.error('被记录');

      expect(testLogger.getLevel()).toBe(LogLevel.ERROR);
      expect(readEntries(testLogDir).map(e => e.context)).toEqual([{ module: 'factory' }]);
    });
  });

  describe('全局日志管理器', () => {
    afterEach(() => {
      GlobalLoggerManager.getInstance().setRootLogger(new Logger({ level: LogLevel.ERROR, console: false, file: false }));
    });

    test('同名模块日志器被缓存', () => {
      expect(getLogger('cache')).toBe(getLogger('cache'));
    });

    test('替换根日志器后模块日志器使用新配置', () => {
      const manager = GlobalLoggerManager.getInstance();
      const before = getLogger('swap');

      manager.setRootLogger(createLogger({ level: LogLevel.DEBUG, console: false, file: false }));
      const after = getLogger('swap');

      expect(after).not.toBe(before);
      expect(after.getLevel()).toBe(LogLevel.DEBUG);
      expect(manager.getRootLogger().getLevel()).toBe(LogLevel.DEBUG);
    });
  });

  describe('错误处理', () => {
    test('文件写入失败时降级到控制台', () => {
      const blocker = join(testLogDir, 'not-a-directory');
      writeFileSync(blocker, '');
      const consoleError = jest.spyOn(console, 'error').mockImplementation(() => {});

      try {
        const invalidLogger = new Logger({ level: LogLevel.INFO, console: false, file: true, logDir: join(blocker, 'logs') });
        expect(() => invalidLogger.info('这条消息应该输出到控制台')).not.toThrow();
        expect(consoleError).toHaveBeenCalled();
      } finally {
        consoleError.mockRestore();
      }
    });

    test('应该自动创建嵌套的日志目录', () => {
      const newLogDir = join(testLogDir, 'nested', 'directory');

      new Logger({ level: LogLevel.INFO, console: false, file: true, logDir: newLogDir }).info('测试消息');

      expect(readdirSync(newLogDir).length).toBe(1);
    });
  });
});
