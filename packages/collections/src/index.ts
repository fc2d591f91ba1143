// Data structures
export { SinglyLinkedList, createNode, type ListNode } from "./singly-linked-list.js";
