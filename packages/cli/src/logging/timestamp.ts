const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local time as "YYYYMMDD_HHMMSS", for log file names.
 */
export function formatFileStamp(date: Date): string {
    const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
    return `${day}_${time}`;
}
