import { normalizeProcessName, PowerShellProcessInspector } from '../process-inspector';
import { createMockShell, MockShell } from './helpers/mocks';

describe('process-inspector', () => {
    describe('normalizeProcessName', () => {
        it('should strip a trailing .exe regardless of case', () => {
            expect(normalizeProcessName('OUTLOOK.EXE')).toBe('OUTLOOK');
            expect(normalizeProcessName('teams.exe')).toBe('teams');
        });

        it('should trim whitespace', () => {
            expect(normalizeProcessName('  outlook  ')).toBe('outlook');
            expect(normalizeProcessName('   ')).toBe('');
        });
    });

    describe('PowerShellProcessInspector', () => {
        let mockShell: MockShell;
        let inspector: PowerShellProcessInspector;

        beforeEach(() => {
            mockShell = createMockShell();
            inspector = new PowerShellProcessInspector(mockShell);
        });

        it('should report not running for an empty name without querying', async () => {
            const result = await inspector.inspect('');

            expect(result).toEqual({ running: false });
            expect(mockShell.exec).not.toHaveBeenCalled();
        });

        it('should report not running for a blank name without querying', async () => {
            const result = await inspector.inspect('   ');

            expect(result).toEqual({ running: false });
            expect(mockShell.exec).not.toHaveBeenCalled();
        });

        it('should report running when Get-Process returns an id', async () => {
            mockShell.exec.mockResolvedValue({ stdout: '4242\r\n', stderr: '' });

            const result = await inspector.inspect('outlook');

            expect(result).toEqual({ running: true });
            expect(mockShell.exec).toHaveBeenCalledWith(
                `powershell -NoProfile -NonInteractive -Command "Get-Process -Name 'outlook' -ErrorAction SilentlyContinue | Select-Object -First 1 -ExpandProperty Id"`,
            );
        });

        it('should report not running when Get-Process returns nothing', async () => {
            mockShell.exec.mockResolvedValue({ stdout: '\r\n', stderr: '' });

            const result = await inspector.inspect('outlook');

            expect(result).toEqual({ running: false });
        });

        it('should query without the .exe extension', async () => {
            mockShell.exec.mockResolvedValue({ stdout: '', stderr: '' });

            await inspector.inspect('outlook.exe');

            expect(mockShell.exec.mock.calls[0][0]).toContain("-Name 'outlook'");
        });

        it('should refuse a name that would break out of the command string', async () => {
            const result = await inspector.inspect('x" & calc & "');

            expect(result).toEqual({
                running: false,
                error: 'Invalid process name: x" & calc & ". Use letters, digits, spaces, dots, dashes or underscores.',
            });
            expect(mockShell.exec).not.toHaveBeenCalled();
        });

        it('should refuse wildcard names', async () => {
            for (const name of ['*', 'out?ook', '[o]utlook', "o'brien"]) {
                const result = await inspector.inspect(name);

                expect(result.running).toBe(false);
                expect(result.error).toBe(`Invalid process name: ${name}. Use letters, digits, spaces, dots, dashes or underscores.`);
            }
            expect(mockShell.exec).not.toHaveBeenCalled();
        });

        it('should accept names with spaces, dots and dashes', async () => {
            mockShell.exec.mockResolvedValue({ stdout: '17', stderr: '' });

            const result = await inspector.inspect('Microsoft.Teams-Helper v2');

            expect(result).toEqual({ running: true });
            expect(mockShell.exec.mock.calls[0][0]).toContain("-Name 'Microsoft.Teams-Helper v2'");
        });

        it('should report a failed lookup as not running with the error', async () => {
            mockShell.exec.mockRejectedValue(new Error('powershell not found'));

            const result = await inspector.inspect('outlook');

            expect(result).toEqual({
                running: false,
                error: 'Failed to query process outlook: powershell not found',
            });
        });
    });
});
