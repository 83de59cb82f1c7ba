export interface Schedulable { run(): void; disposed?: boolean };

// 單一 FIFO 佇列：同一個 notifier 排進來的通知保持相對順序
const queue: Schedulable[] = [];

let scheduled = false;

export function scheduleJob(job: Schedulable) {
  if (job.disposed) return;
  queue.push(job);

  if (!scheduled) {
    scheduled = true;
    queueMicrotask(flushJobs);
  }
}

export function flushSync() {
  if (!scheduled && queue.length === 0) return;
  flushJobs();
}

function flushJobs() {
  scheduled = false;
  let guard = 0;

  while (queue.length > 0) {
    if (++guard > 10000) {
      queue.length = 0;
      throw new Error("Infinite notification loop");
    }
    const jobs = queue.splice(0, queue.length);
    for (const job of jobs) {
      // 排進來之後才被 dispose 的 job 直接跳過
      if (job.disposed) continue;
      job.run();
    }
  }
}
