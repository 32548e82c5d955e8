/**
 * Binary min-heap ordered by a caller-supplied comparison.
 */
export class MinHeap<T> {
	private readonly items: T[] = [];

	constructor(private readonly compare: (a: T, b: T) => number) {}

	get size(): number {
		return this.items.length;
	}

	peek(): T | undefined {
		return this.items[0];
	}

	push(item: T): void {
		this.items.push(item);
		this.siftUp(this.items.length - 1);
	}

	pop(): T | undefined {
		const top = this.items[0];
		const last = this.items.pop();
		if (this.items.length > 0 && last !== undefined) {
			this.items[0] = last;
			this.siftDown(0);
		}
		return top;
	}

	private siftUp(index: number): void {
		let child = index;
		while (child > 0) {
			const parent = (child - 1) >> 1;
			if (this.compare(this.items[child], this.items[parent]) >= 0) break;
			this.swap(child, parent);
			child = parent;
		}
	}

	private siftDown(index: number): void {
		const length = this.items.length;
		let parent = index;
		while (true) {
			const left = parent * 2 + 1;
			const right = left + 1;
			let smallest = parent;
			if (
				left < length &&
				this.compare(this.items[left], this.items[smallest]) < 0
			) {
				smallest = left;
			}
			if (
				right < length &&
				this.compare(this.items[right], this.items[smallest]) < 0
			) {
				smallest = right;
			}
			if (smallest === parent) return;
			this.swap(parent, smallest);
			parent = smallest;
		}
	}

	private swap(a: number, b: number): void {
		const tmp = this.items[a];
		this.items[a] = this.items[b];
		this.items[b] = tmp;
	}
}
