export const NO_SPEECH_RECOGNIZED = 'ไม่สามารถเข้าใจเสียงพูดได้';
export const UNSUPPORTED_AUDIO = 'ไม่รองรับรูปแบบไฟล์เสียงนี้ กรุณาส่งไฟล์ WAV';
export const recognitionFailed = (detail: string) => `เกิดข้อผิดพลาดในการรู้จำเสียง: ${detail}`;
export const audioTooLong = (seconds: number) => `เสียงที่บันทึกยาวเกิน ${seconds} วินาที`;
